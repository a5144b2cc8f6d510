/**
 * Whether `err` is a Node.js system error (`ErrnoException`) with `code`,
 * e.g. `"ENOENT"` or `"EEXIST"`.
 */
export function hasErrorCode(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && err.code === code
}
