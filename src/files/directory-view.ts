/**
 * The names taken in an export directory as a rename pass sees them. Planned
 * moves update the view whether or not they touch the disk, so a dry run
 * decides collisions exactly as the real run would.
 */
export class DirectoryView {
  private readonly taken = new Set<string>();
  private readonly caseInsensitive: boolean;

  constructor(names: Iterable<string>, caseInsensitive: boolean) {
    this.caseInsensitive = caseInsensitive;
    for (const name of names) this.taken.add(this.key(name));
  }

  has(name: string): boolean {
    return this.taken.has(this.key(name));
  }

  move(from: string, to: string): void {
    this.taken.delete(this.key(from));
    this.taken.add(this.key(to));
  }

  private key(name: string): string {
    return this.caseInsensitive ? name.toLowerCase() : name;
  }
}

/** APFS, HFS+ and NTFS compare names without regard to case by default. */
export function defaultCaseInsensitive(): boolean {
  return process.platform === 'darwin' || process.platform === 'win32';
}
