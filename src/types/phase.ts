export type RunPhase =
  | "listing"
  | "dispatching"
  | "draining"
  | "finalizing"
  | "done"
  | "aborted";
