import fs from 'node:fs';
import path from 'node:path';

/** The subset of the Web Storage API the record store needs. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class MemoryStorage implements KeyValueStorage {
  private readonly _items = new Map<string, string>();

  getItem(key: string): string | null {
    return this._items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this._items.set(key, value);
  }

  removeItem(key: string): void {
    this._items.delete(key);
  }
}

/**
 * All keys in one JSON file. Every write replaces the file through a
 * temporary sibling so a crash never leaves it half written.
 */
export class FileStorage implements KeyValueStorage {
  private _items: Record<string, string> | null = null;

  constructor(readonly filePath: string) {}

  getItem(key: string): string | null {
    return this._read()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    const items = { ...this._read(), [key]: value };
    this._write(items);
  }

  removeItem(key: string): void {
    const { [key]: _removed, ...items } = this._read();
    this._write(items);
  }

  private _read(): Record<string, string> {
    if (this._items) return this._items;
    if (!fs.existsSync(this.filePath)) {
      this._items = {};
      return this._items;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${this.filePath} does not hold a JSON object`);
    }
    const items: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') items[key] = value;
    }
    this._items = items;
    return items;
  }

  private _write(items: Record<string, string>): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(items, null, 2));
    fs.renameSync(tmp, this.filePath);
    this._items = items;
  }
}
