export type PoolNaming = "md5" | "sequence";

export type Mode =
  | { kind: "post"; ids: number[] }
  | { kind: "pool"; id: number; naming: PoolNaming }
  | { kind: "tags"; tags: string[] };

export type ModeKind = Mode["kind"];
