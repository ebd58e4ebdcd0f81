/** The `code` of a failed filesystem or spawn call ("ENOENT", "EACCES", ...), or null for any other error. */
export function errnoCode(err: unknown): string | null {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}
