import { z } from "zod";

export const EventType = z.enum([
  "contract.resolved",
  "contract.resolution_failed",
  "chunks.written",
  "chunks.loaded",
  "registry.loaded",
  "config.updated",
]);
export type EventType = z.infer<typeof EventType>;

export const BaseEvent = z.object({
  eventId: z.number().int().nonnegative(),
  type: EventType,
  timestamp: z.string().datetime(),
  actor: z.string(),
  /** Tool contract id the event concerns, when there is one. */
  taskId: z.string().optional(),
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
