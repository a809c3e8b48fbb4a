/**
 * Event logger: append-only JSONL event log, one file per UTC day.
 *
 * Resolution stays pure; callers around it (the resolution service, the
 * CLI) record what happened here.
 */

import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { BaseEvent, EventType } from "../schemas/event.js";

export type EventCallback = (event: BaseEvent) => void;

export interface EventLoggerOptions {
  /** Called after each event is written (tests, live views). */
  onEvent?: EventCallback;
}

export interface LogEventInput {
  taskId?: string;
  payload?: Record<string, unknown>;
}

export class EventLogger {
  private readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private lastEventId = 0;
  private dirReady?: Promise<unknown>;

  constructor(eventsDir: string, options: EventLoggerOptions = {}) {
    this.eventsDir = eventsDir;
    this.onEvent = options.onEvent;
  }

  /** Append one event and return it. */
  async log(type: EventType, actor: string, input: LogEventInput = {}): Promise<BaseEvent> {
    const timestamp = new Date();
    // Monotonic even when two events share a millisecond.
    this.lastEventId = Math.max(this.lastEventId + 1, timestamp.getTime());

    const event: BaseEvent = {
      eventId: this.lastEventId,
      type,
      timestamp: timestamp.toISOString(),
      actor,
      ...(input.taskId !== undefined ? { taskId: input.taskId } : {}),
      payload: input.payload ?? {},
    };

    this.dirReady ??= mkdir(this.eventsDir, { recursive: true });
    await this.dirReady;
    await appendFile(this.filePath(timestamp), JSON.stringify(event) + "\n", "utf-8");

    this.onEvent?.(event);
    return event;
  }

  /** Path of the log file holding events from `date`. */
  filePath(date: Date = new Date()): string {
    return join(this.eventsDir, `${date.toISOString().slice(0, 10)}.jsonl`);
  }
}
