/**
 * Elements resolved while processing a document, keyed by qualified name.
 */

/**
 * What is known about one element.
 */
export interface ElementEntry {
  guid?: string;
  displayName?: string;
  /** Metadata type, e.g. `Glossary` or `GlossaryTerm` */
  typeName?: string;
}

/**
 * Whether an entry is of a type. An entry recorded without one matches when
 * the type appears in its qualified name.
 */
function isOfType(qualifiedName: string, entry: ElementEntry, typeName: string | undefined): boolean {
  if (typeName === undefined) {
    return true;
  }
  if (entry.typeName !== undefined) {
    return entry.typeName === typeName;
  }
  return qualifiedName.toLowerCase().includes(typeName.toLowerCase());
}

/**
 * Name to element lookup for one processing session. Entries live as long as
 * the dictionary; nothing is evicted or persisted.
 */
export class ElementDictionary {
  private readonly elements = new Map<string, ElementEntry>();

  get(qualifiedName: string): ElementEntry | undefined {
    return this.elements.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.elements.has(qualifiedName);
  }

  /**
   * Records what is known about an element, merging into an existing entry.
   * Ignored without a key or with nothing to record.
   */
  update(qualifiedName: string | null | undefined, entry: ElementEntry): void {
    if (!qualifiedName || (entry.guid === undefined && entry.displayName === undefined)) {
      return;
    }
    const existing = this.elements.get(qualifiedName) ?? {};
    this.elements.set(qualifiedName, {
      guid: entry.guid ?? existing.guid,
      displayName: entry.displayName ?? existing.displayName,
      typeName: entry.typeName ?? existing.typeName,
    });
  }

  /**
   * The key equal to `value`, or the key of the entry whose GUID or display
   * name equals it. With a type name only entries of that type match.
   */
  findKeyWithValue(value: string, typeName?: string): string | undefined {
    const direct = this.elements.get(value);
    if (direct !== undefined && isOfType(value, direct, typeName)) {
      return value;
    }
    for (const [key, entry] of this.elements) {
      if ((entry.guid === value || entry.displayName === value) && isOfType(key, entry, typeName)) {
        return key;
      }
    }
    return undefined;
  }

  entries(): Array<[string, ElementEntry]> {
    return [...this.elements.entries()];
  }

  clear(): void {
    this.elements.clear();
  }

  get size(): number {
    return this.elements.size;
  }
}

/** Dictionary shared by the CLI's processing runs. */
export const defaultElementDictionary = new ElementDictionary();
