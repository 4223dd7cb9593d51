/** Post ID, or a positional label for listing entries that carry none. */
export type ItemId = number | string;

export type ItemResult =
  | { ok: true; id: ItemId; filename: string }
  | { ok: false; id: ItemId; reason: string };

export type ItemSuccess = Extract<ItemResult, { ok: true }>;
export type ItemFailure = Extract<ItemResult, { ok: false }>;

export interface BatchReport {
  succeeded: ItemSuccess[];
  failed: ItemFailure[];
}

export const emptyReport = (): BatchReport => ({ succeeded: [], failed: [] });
