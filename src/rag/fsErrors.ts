/** True for errors meaning "nothing exists at this path". */
export function isMissingPath(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}
