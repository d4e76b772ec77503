import { z } from "zod";

export const WorkStatusSchema = z.enum([
  "created",
  "starting",
  "running",
  "stopping",
  "stopped",
  "restarting",
  "failed",
]);
export type WorkStatus = z.infer<typeof WorkStatusSchema>;

const TRANSITIONS: Record<WorkStatus, readonly WorkStatus[]> = {
  created: ["starting", "stopping", "restarting", "failed"],
  starting: ["running", "failed", "stopping"],
  running: ["stopping", "restarting", "failed", "stopped"],
  stopping: ["stopped"],
  stopped: ["starting", "restarting"],
  restarting: ["starting", "failed"],
  failed: ["starting", "stopping", "restarting"],
};

export function canTransition(from: WorkStatus, to: WorkStatus): boolean {
  return TRANSITIONS[from].includes(to);
}
