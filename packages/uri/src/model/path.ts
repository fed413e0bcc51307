import { PathBuilder } from "../builder/path-builder.js";
import { percentDecode } from "../codec/percent.js";
import type { TextSpan } from "./span.js";

/**
 * Which path production matched.
 *
 * - `empty`    zero characters
 * - `abempty`  after an authority: empty or begins with "/"
 * - `absolute` begins with "/" but not "//"
 * - `noscheme` begins with a segment without ":" (relative references)
 * - `rootless` begins with a segment
 */
export type PathKind = "empty" | "abempty" | "absolute" | "noscheme" | "rootless";

export class Path {
  /**
   * @param segments - raw text between the `/` separators; a rooted path's leading `/`
   *   opens the first segment, so `/a/` has segments `["a", ""]`.
   */
  constructor(
    readonly kind: PathKind,
    readonly raw: string,
    readonly span: TextSpan,
    readonly segments: readonly string[],
  ) {}

  static empty(at = 0): Path {
    return new Path("empty", "", { start: at, end: at }, []);
  }

  get isRooted(): boolean {
    return this.kind === "abempty" || this.kind === "absolute";
  }

  /** Decoded segments on an owned builder; rooted kinds become `absolute`, the rest `relative`. */
  builder(): PathBuilder {
    if (this.kind === "empty") return new PathBuilder();
    return new PathBuilder(this.isRooted ? "absolute" : "relative", this.segments.map(percentDecode));
  }

  toString(): string {
    return this.raw;
  }
}
