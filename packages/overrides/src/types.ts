/** One `<namespace>.<identifier>.<field>=value` line. Values may be secrets. */
export interface OverrideEntry {
  key: string;
  value: string;
}

/** Ordered, keys unique. */
export type OverrideSet = readonly OverrideEntry[];

export type ParseOverridesOptions = {
  /** Called for each repeated key with its line and the line of the first occurrence. */
  onDuplicate?: (key: string, line: number, firstLine: number) => void;
};
