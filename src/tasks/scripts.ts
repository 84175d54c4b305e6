export const DEFAULT_BOOTSTRAP_TEMPLATE = [
  "export OMP_NUM_THREADS=1",
  'if [[ -f ~/.bashrc ]] && grep -q "__conda_setup=" ~/.bashrc; then',
  "  . ~/.bashrc",
  "fi",
  "conda activate {{environment}}"
].join("\n");

const ENVIRONMENT_RE = /^[A-Za-z0-9_./-]+$/;

function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

/**
 * Substitutes `{{environment}}`. Without an environment, lines that mention
 * the placeholder are dropped.
 */
export function renderBootstrap(template: string, environment: string | null): string {
  if (environment !== null && !ENVIRONMENT_RE.test(environment)) {
    throw new Error(`invalid environment name: ${JSON.stringify(environment)}`);
  }
  return template
    .split(/\r?\n/)
    .filter((line) => environment !== null || !line.includes("{{environment}}"))
    .map((line) => (environment === null ? line : line.split("{{environment}}").join(environment)))
    .join("\n");
}

export function renderSubmitScript(input: {
  jobName: string;
  node: string;
  executorPath: string;
  paramsPath: string;
  resultPath: string;
  bootstrapTemplate: string;
  environment: string | null;
}): string {
  const jobName = input.jobName.replace(/[^A-Za-z0-9_.-]/g, "_").slice(0, 128);
  const lines: string[] = [];
  lines.push("#!/bin/bash");
  lines.push(`#$ -N ${jobName}`);
  lines.push("#$ -S /bin/bash");
  lines.push("");
  const bootstrap = renderBootstrap(input.bootstrapTemplate, input.environment).trim();
  if (bootstrap) {
    lines.push(bootstrap);
    lines.push("");
  }
  lines.push("set -eo pipefail");
  lines.push(
    `exec ${[input.node, input.executorPath, input.paramsPath, input.resultPath].map(bashSingleQuote).join(" ")}`
  );
  lines.push("");
  return lines.join("\n");
}

export const EXECUTOR_EXIT_UNKNOWN_TASK = 3;
export const EXECUTOR_EXIT_MISSING_REQUIREMENT = 4;

/**
 * Node ESM program run on the compute node: `node executor.mjs <params> <result>`.
 * The registry module named in the params file is the only place task code is
 * looked up.
 */
export function renderExecutorScript(): string {
  return `#!/usr/bin/env node
import { readFile, writeFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { pathToFileURL } from "node:url";

const [paramsPath, resultPath] = process.argv.slice(2);
if (!paramsPath || !resultPath) {
  console.error("usage: executor.mjs <params.json> <result.json>");
  process.exit(2);
}

const params = JSON.parse(await readFile(paramsPath, "utf8"));
const registryPath = path.isAbsolute(params.registry) ? params.registry : null;
const requireFrom = createRequire(registryPath ?? path.join(process.cwd(), "index.js"));

for (const dep of params.requires) {
  try {
    requireFrom.resolve(dep);
  } catch (err) {
    console.error(\`missing requirement: \${dep}: \${err instanceof Error ? err.message : String(err)}\`);
    process.exit(${EXECUTOR_EXIT_MISSING_REQUIREMENT});
  }
}

const registry = await import(registryPath ? pathToFileURL(registryPath).href : params.registry);
const tasks = registry.tasks ?? registry.default;
const fn = tasks ? tasks[params.task] : undefined;
if (typeof fn !== "function") {
  console.error(\`unknown task: \${params.task}\`);
  process.exit(${EXECUTOR_EXIT_UNKNOWN_TASK});
}

const value = await fn({ args: params.args, kwargs: params.kwargs });
await writeFile(resultPath, JSON.stringify({ value: value === undefined ? null : value }));
`;
}
