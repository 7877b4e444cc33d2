/**
 * Generated files of the current session, by file name. Passed explicitly to
 * the flows that fill it; `clear()` doubles as the reset action.
 */
export class DownloadStore {
  private readonly files = new Map<string, Buffer>();

  put(name: string, bytes: Buffer): void {
    this.files.set(name, bytes);
  }

  get(name: string): Buffer | undefined {
    return this.files.get(name);
  }

  has(name: string): boolean {
    return this.files.has(name);
  }

  entries(): Array<{ name: string; bytes: Buffer }> {
    return [...this.files].map(([name, bytes]) => ({ name, bytes }));
  }

  get size(): number {
    return this.files.size;
  }

  clear(): void {
    this.files.clear();
  }
}
