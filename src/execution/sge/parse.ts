export type QueueStatus = "running" | "failed" | "unknown";
export type AccountingStatus = "success" | "failed" | "unknown";

const RUNNING_CODES = new Set(["r", "qw", "t"]);
const FAILED_CODES = new Set(["Eqw", "d"]);

function fields(line: string): string[] {
  const trimmed = line.trim();
  return trimmed ? trimmed.split(/\s+/) : [];
}

export function parseQsubJobId(stdout: string): string | null {
  const m = /Your job (\d+)/.exec(stdout);
  return m && m[1] ? m[1] : null;
}

export function mapQueueStateCode(code: string): Exclude<QueueStatus, "unknown"> {
  if (RUNNING_CODES.has(code)) return "running";
  if (FAILED_CODES.has(code)) return "failed";
  // Codes outside both sets (suspended, held, transferring variants...) keep
  // the job under observation; accounting decides once it leaves the queue.
  return "running";
}

/** Finds `jobId` in `qstat` output; the state code is the fifth column. */
export function parseQstatStatus(stdout: string, jobId: string): QueueStatus {
  for (const line of stdout.split(/\r?\n/)) {
    const cols = fields(line);
    if (cols[0] !== jobId) continue;
    const code = cols[4];
    if (code === undefined) return "unknown";
    return mapQueueStateCode(code);
  }
  return "unknown";
}

/** Reads `exit_status` from `qacct -j` output. */
export function parseQacctStatus(stdout: string): AccountingStatus {
  for (const line of stdout.split(/\r?\n/)) {
    const cols = fields(line);
    if (cols[0] !== "exit_status") continue;
    const value = cols[1];
    if (value === undefined) return "unknown";
    return value === "0" ? "success" : "failed";
  }
  return "unknown";
}
