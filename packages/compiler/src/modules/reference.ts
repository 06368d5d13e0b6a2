const SEGMENT_SEPARATOR = ".";
const INVALID_SEGMENT_CHARS = /[./\\]/;

/**
 * Identifies an importable module by its ordered name segments, e.g.
 * `["std"]` or `["foo", "bar", "baz"]`. Two references are the same module
 * iff their segments are equal element-wise; `key` is the stable form of that
 * identity and doubles as the fully-qualified module name.
 */
export class ModuleReference {
  readonly segments: readonly string[];
  readonly key: string;

  constructor(segments: readonly string[]) {
    if (segments.length === 0) {
      throw new RangeError("module reference requires at least one segment");
    }
    const invalid = segments.find(
      (segment) => segment.length === 0 || INVALID_SEGMENT_CHARS.test(segment)
    );
    if (invalid !== undefined) {
      throw new RangeError(
        `invalid module reference segment "${invalid}" in [${segments.join(", ")}]`
      );
    }
    this.segments = Object.freeze([...segments]);
    this.key = this.segments.join(SEGMENT_SEPARATOR);
  }

  static of(...segments: string[]): ModuleReference {
    return new ModuleReference(segments);
  }

  /** Builds a reference from its dotted form, `foo.bar.baz`. */
  static parse(text: string): ModuleReference {
    return new ModuleReference(text.trim().split(SEGMENT_SEPARATOR));
  }

  equals(other: ModuleReference): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.key;
  }
}
