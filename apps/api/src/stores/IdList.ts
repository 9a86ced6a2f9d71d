export interface ReadonlyIdList {
  readonly size: number;
  has(id: string): boolean;
  toArray(): string[];
  toLine(): string;
}

/**
 * Ordered, duplicate-free list of IDs. Duplicates are detected
 * case-insensitively; the first spelling seen is kept.
 * Order is insertion order and is what gets persisted.
 */
export class IdList implements ReadonlyIdList {
  private ids: string[] = [];
  private keys = new Set<string>();

  constructor(ids: Iterable<string> = []) {
    for (const id of ids) {
      this.add(id);
    }
  }

  /**
   * Accepts the one-line `a;b;c` format as well as older one-ID-per-line files.
   */
  static parse(content: string): IdList {
    return new IdList(content.split(/[;\r\n]+/));
  }

  get size(): number {
    return this.ids.length;
  }

  has(id: string): boolean {
    return this.keys.has(id.trim().toLowerCase());
  }

  add(id: string): boolean {
    const trimmed = id.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || this.keys.has(key)) {
      return false;
    }
    this.ids.push(trimmed);
    this.keys.add(key);
    return true;
  }

  remove(id: string): boolean {
    const key = id.trim().toLowerCase();
    if (!this.keys.has(key)) {
      return false;
    }
    this.ids = this.ids.filter((existing) => existing.toLowerCase() !== key);
    this.keys.delete(key);
    return true;
  }

  toArray(): string[] {
    return [...this.ids];
  }

  toLine(): string {
    return this.ids.join(';');
  }

  /** File contents: one line, newline-terminated unless empty. */
  serialize(): string {
    const line = this.toLine();
    return line ? `${line}\n` : '';
  }

  clone(): IdList {
    return new IdList(this.ids);
  }
}
