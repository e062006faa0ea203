/**
 * Directory entry model
 *
 * An entry is a bag of attributes. Each attribute holds an ordered list of
 * tagged values; whether the attribute is read as a list or as a single value
 * is decided by `multiValued`, never by inspecting the value.
 */

export type AttributeValue =
  | { type: 'string'; value: string }
  | { type: 'integer'; value: number }
  | { type: 'bytes'; value: Buffer }
  | { type: 'timestamp'; value: Date };

export type AttributeValueType = AttributeValue['type'];

export interface DirectoryAttribute {
  /** Attribute name as the directory spelled it */
  name: string;
  values: readonly AttributeValue[];
  multiValued: boolean;
}

export const stringValue = (value: string): AttributeValue => ({ type: 'string', value });
export const integerValue = (value: number): AttributeValue => ({ type: 'integer', value });
export const bytesValue = (value: Buffer): AttributeValue => ({ type: 'bytes', value });
export const timestampValue = (value: Date): AttributeValue => ({ type: 'timestamp', value });

export class DirectoryEntry {
  private readonly attributes = new Map<string, DirectoryAttribute>();

  constructor(public readonly dn: string, attributes: Iterable<DirectoryAttribute> = []) {
    for (const attribute of attributes) {
      this.set(attribute);
    }
  }

  /**
   * Add or replace an attribute. Names are matched case-insensitively.
   */
  set(attribute: DirectoryAttribute): void {
    this.attributes.set(attribute.name.toLowerCase(), attribute);
  }

  has(name: string): boolean {
    return this.attributes.has(name.toLowerCase());
  }

  get(name: string): DirectoryAttribute | undefined {
    return this.attributes.get(name.toLowerCase());
  }

  /**
   * First value of an attribute, or undefined when the attribute is absent or empty
   */
  first(name: string): AttributeValue | undefined {
    return this.get(name)?.values[0];
  }

  /**
   * First value as a string, when the attribute holds a string
   */
  getString(name: string): string | undefined {
    const value = this.first(name);
    return value?.type === 'string' ? value.value : undefined;
  }

  /**
   * First value as an integer, when the attribute holds an integer
   */
  getInteger(name: string): number | undefined {
    const value = this.first(name);
    return value?.type === 'integer' ? value.value : undefined;
  }

  /**
   * All string values of an attribute; empty when absent
   */
  getStrings(name: string): string[] {
    const attribute = this.get(name);
    if (!attribute) return [];
    return attribute.values.flatMap(v => (v.type === 'string' ? [v.value] : []));
  }

  /** Attributes in the order they were added */
  list(): DirectoryAttribute[] {
    return [...this.attributes.values()];
  }
}

/**
 * Ordered classification of entries: users by group, computers by OS
 */
export type GroupedEntries = Map<string, DirectoryEntry[]>;
