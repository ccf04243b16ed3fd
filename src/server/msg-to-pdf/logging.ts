export type Logger = Pick<Console, "log" | "warn" | "error">;

export function kilobytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}
