import { percentEncode } from "../codec/percent.js";

export type PathBuilderKind = "empty" | "absolute" | "relative";

/**
 * Owned, mutable path: decoded segments plus whether the path is rooted.
 *
 * `parent()` and `child()` return new builders and leave the receiver untouched; the
 * segments array itself can be edited in place.
 */
export class PathBuilder {
  constructor(
    public kind: PathBuilderKind = "empty",
    public segments: string[] = [],
  ) {}

  static absolute(...segments: string[]): PathBuilder {
    return new PathBuilder("absolute", segments);
  }

  static relative(...segments: string[]): PathBuilder {
    return new PathBuilder("relative", segments);
  }

  /**
   * Absolute: the last segment dropped (the root stays the root).
   * Relative: the last segment dropped, or `..` added once nothing is left to drop.
   */
  parent(): PathBuilder {
    switch (this.kind) {
      case "empty":
        return new PathBuilder();
      case "absolute":
        return new PathBuilder("absolute", this.segments.slice(0, -1));
      case "relative":
        return this.segments.length === 0
          ? new PathBuilder("relative", [".."])
          : new PathBuilder("relative", this.segments.slice(0, -1));
    }
  }

  child(name: string): PathBuilder {
    const kind = this.kind === "empty" ? "relative" : this.kind;
    return new PathBuilder(kind, [...this.segments, name]);
  }

  /** An `empty` builder whose segments were filled in place renders as relative. */
  toString(): string {
    const body = this.segments.map(percentEncode).join("/");
    const kind = this.kind === "empty" && this.segments.length > 0 ? "relative" : this.kind;
    switch (kind) {
      case "empty":
        return "";
      case "absolute":
        return `/${body}`;
      case "relative":
        return body;
    }
  }
}
