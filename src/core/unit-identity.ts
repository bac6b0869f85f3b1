export type UnitIdentity = {
  libraryCode: string;
  batchCode: string;
  sampleName: string;
};

export type WorkUnit = UnitIdentity & {
  // Absolute path of the sample directory holding the raw files.
  inputPath: string;
  // Path relative to the input root, always "/"-separated.
  relativePath: string;
  // Name of the layout matcher that found the unit.
  layout: string;
};

const DATE_TOKEN = /([0-9]{8}|[0-9]{4}-[0-9]{2}-[0-9]{2})/;

export function splitRelativePath(relativePath: string): string[] {
  return relativePath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");
}

/**
 * Derive a unit's identifiers from its path relative to the input root.
 *
 * Never fails: a path without a date token or a second segment gets an empty
 * batch code.
 */
export function deriveUnitIdentity(relativePath: string): UnitIdentity {
  const segments = splitRelativePath(relativePath);
  const normalized = segments.join("/");

  const libraryCode = segments[0] ?? "";
  const sampleName = segments[segments.length - 1] ?? "";

  const dateMatch = DATE_TOKEN.exec(normalized);
  const batchCode = dateMatch?.[1] ?? segments[1] ?? "";

  return { libraryCode, batchCode, sampleName };
}

export function unitKey(unit: UnitIdentity): string {
  return [unit.libraryCode, unit.batchCode, unit.sampleName].filter(Boolean).join("/");
}
