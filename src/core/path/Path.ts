/**
 * One step from a parent value to a child value.
 */
export type Segment =
  | { kind: 'property'; name: string }
  | { kind: 'index'; index: number }
  | { kind: 'mapKey'; key: unknown }
  | { kind: 'mapValue'; key: unknown }
  | { kind: 'named'; label: string };

function renderSegment(segment: Segment): string {
  switch (segment.kind) {
    case 'property':
      return segment.name;
    case 'named':
      return segment.label;
    case 'index':
      return `[${segment.index}]<iterable element>`;
    case 'mapKey':
      return `[${String(segment.key)}]<map key>`;
    case 'mapValue':
      return `[${String(segment.key)}]<map value>`;
  }
}

function isDotted(segment: Segment): boolean {
  return segment.kind === 'property' || segment.kind === 'named';
}

/**
 * Immutable location of a value inside the validated object graph.
 *
 * Descending returns a new Path; the receiver is never modified, so sibling
 * branches can hold their own Path without copying.
 *
 * @example
 * ```typescript
 * Path.root().property('address').property('street').fullName; // 'address.street'
 * Path.root().property('list').index(1).fullName;                // 'list[1]<iterable element>'
 * Path.root().mapValue('b').fullName;                            // '[b]<map value>'
 * ```
 */
export class Path {
  private static readonly EMPTY = new Path([]);

  private constructor(readonly segments: readonly Segment[]) {}

  static root(): Path {
    return Path.EMPTY;
  }

  static of(...segments: Segment[]): Path {
    return segments.length === 0 ? Path.EMPTY : new Path(segments);
  }

  append(segment: Segment): Path {
    return new Path([...this.segments, segment]);
  }

  property(name: string): Path {
    return this.append({ kind: 'property', name });
  }

  index(index: number): Path {
    return this.append({ kind: 'index', index });
  }

  mapKey(key: unknown): Path {
    return this.append({ kind: 'mapKey', key });
  }

  mapValue(key: unknown): Path {
    return this.append({ kind: 'mapValue', key });
  }

  named(label: string): Path {
    return this.append({ kind: 'named', label });
  }

  get last(): Segment | undefined {
    return this.segments[this.segments.length - 1];
  }

  get parent(): Path {
    return this.segments.length <= 1 ? Path.EMPTY : new Path(this.segments.slice(0, -1));
  }

  get depth(): number {
    return this.segments.length;
  }

  isEmpty(): boolean {
    return this.segments.length === 0;
  }

  /**
   * Dotted/bracketed rendering; property and named segments are joined with
   * `.`, index and map segments are appended to their predecessor.
   */
  get fullName(): string {
    let name = '';
    for (const segment of this.segments) {
      const text = renderSegment(segment);
      if (text === '') continue;
      name = name !== '' && isDotted(segment) ? `${name}.${text}` : `${name}${text}`;
    }
    return name;
  }

  toString(): string {
    return this.fullName;
  }
}
