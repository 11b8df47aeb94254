/**
 * StringOrList - A query field that holds either one value or an ordered list of values
 */

export class StringOrList {
  private constructor(
    readonly kind: 'scalar' | 'list',
    private readonly items: readonly string[]
  ) {}

  static scalar(value: string): StringOrList {
    // An empty scalar is "not specified"
    return new StringOrList('scalar', value === '' ? [] : [value]);
  }

  /**
   * Empty elements are dropped, so `['']` is as unset as an empty scalar
   */
  static list(values: readonly string[]): StringOrList {
    return new StringOrList('list', Object.freeze(values.filter(value => value !== '')));
  }

  /**
   * Normalized view: a scalar yields a one-element list
   */
  values(): readonly string[] {
    return this.items;
  }

  isList(): boolean {
    return this.kind === 'list';
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  toJSON(): string | readonly string[] {
    if (this.kind === 'list') {
      return this.items;
    }
    return this.items.length > 0 ? this.items[0] : '';
  }
}

/**
 * True when the field is set and holds at least one value
 */
export function hasValues(field: StringOrList | undefined): field is StringOrList {
  return field !== undefined && !field.isEmpty();
}
