/**
 * Lecture tolérante de records JSON non typés.
 *
 * Un `RecordReader` lit des champs sous un chemin pointé ("components[1].position") et
 * note le premier problème rencontré au lieu de lever : les champs fautifs renvoient une
 * valeur neutre, et l'appelant consulte `issue` une fois le record lu.
 */

import { ErrorCode, type WardrobeError } from '@/core/contracts/project';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

type IssueSink = { first?: WardrobeError };

function joinPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

export class RecordReader {
  private constructor(
    private readonly data: JsonObject,
    readonly path: string,
    private readonly sink: IssueSink
  ) {}

  static of(data: JsonObject, path = ''): RecordReader {
    return new RecordReader(data, path, {});
  }

  /** Premier problème noté par ce reader ou l'un de ses enfants. */
  get issue(): WardrobeError | undefined {
    return this.sink.first;
  }

  has(key: string): boolean {
    return this.data[key] !== undefined;
  }

  raw(key: string): unknown {
    return this.data[key];
  }

  private note(code: ErrorCode, key: string, message: string): void {
    if (this.sink.first) return;
    const field = joinPath(this.path, key);
    this.sink.first = { code, field, message: `${message}: ${field}` };
  }

  private missing(key: string): void {
    this.note(ErrorCode.MissingField, key, 'Missing required field');
  }

  /** Note un champ présent mais invalide (type, valeur hors énumération, forme). */
  invalid(key: string, expected: string): void {
    this.note(ErrorCode.InvalidFormat, key, `Expected ${expected}`);
  }

  number(key: string): number {
    const v = this.data[key];
    if (v === undefined) {
      this.missing(key);
      return 0;
    }
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      this.invalid(key, 'a number');
      return 0;
    }
    return v;
  }

  optNumber(key: string, fallback: number): number {
    return this.has(key) ? this.number(key) : fallback;
  }

  string(key: string): string {
    const v = this.data[key];
    if (v === undefined) {
      this.missing(key);
      return '';
    }
    if (typeof v !== 'string') {
      this.invalid(key, 'a string');
      return '';
    }
    return v;
  }

  optString(key: string, fallback: string): string {
    return this.has(key) ? this.string(key) : fallback;
  }

  /** Chaîne optionnelle : absente ou null → undefined. */
  nullableString(key: string): string | undefined {
    const v = this.data[key];
    if (v === undefined || v === null) return undefined;
    if (typeof v !== 'string') {
      this.invalid(key, 'a string or null');
      return undefined;
    }
    return v;
  }

  optBoolean(key: string, fallback: boolean): boolean {
    const v = this.data[key];
    if (v === undefined) return fallback;
    if (typeof v !== 'boolean') {
      this.invalid(key, 'a boolean');
      return fallback;
    }
    return v;
  }

  optOneOf<T extends string>(key: string, values: readonly T[], fallback: T): T {
    const v = this.data[key];
    if (v === undefined) return fallback;
    const match = values.find((candidate) => candidate === v);
    if (match === undefined) {
      this.invalid(key, `one of ${values.join(', ')}`);
      return fallback;
    }
    return match;
  }

  optNumberArray(key: string, fallback: number[]): number[] {
    const v = this.data[key];
    if (v === undefined) return fallback;
    if (!Array.isArray(v) || !v.every((n): n is number => typeof n === 'number' && Number.isFinite(n))) {
      this.invalid(key, 'an array of numbers');
      return fallback;
    }
    return [...v];
  }

  /** Sous-objet obligatoire. */
  child(key: string): RecordReader {
    const v = this.data[key];
    const path = joinPath(this.path, key);
    if (v === undefined) {
      this.missing(key);
      return new RecordReader({}, path, this.sink);
    }
    if (!isJsonObject(v)) {
      this.invalid(key, 'an object');
      return new RecordReader({}, path, this.sink);
    }
    return new RecordReader(v, path, this.sink);
  }

  /** Sous-objet optionnel : absent → reader vide (tous les champs prennent leur défaut). */
  optChild(key: string): RecordReader {
    return this.has(key) ? this.child(key) : new RecordReader({}, joinPath(this.path, key), this.sink);
  }

  /** Tableau optionnel d'éléments bruts ; chaque élément reçoit son chemin indexé. */
  optArray(key: string): Array<{ item: unknown; path: string }> {
    const v = this.data[key];
    if (v === undefined) return [];
    if (!Array.isArray(v)) {
      this.invalid(key, 'an array');
      return [];
    }
    const base = joinPath(this.path, key);
    return v.map((item, i) => ({ item, path: `${base}[${i}]` }));
  }

  /** Reader enfant partageant le même puits de problèmes, pour un élément de tableau. */
  element(item: unknown, path: string): RecordReader | undefined {
    if (!isJsonObject(item)) {
      if (!this.sink.first) {
        this.sink.first = {
          code: ErrorCode.InvalidFormat,
          field: path,
          message: `Expected an object: ${path}`,
        };
      }
      return undefined;
    }
    return new RecordReader(item, path, this.sink);
  }
}
