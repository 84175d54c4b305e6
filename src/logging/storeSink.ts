import type { JobStore } from "../store/jobStore.js";
import type { JobEvent, JobEventSink } from "./jobLog.js";

export class StoreEventSink implements JobEventSink {
  constructor(private readonly store: JobStore) {}

  async write(event: JobEvent): Promise<void> {
    await this.store.addEvent(event);
  }
}
