import { SchemeBuilder, type SchemeKind } from "../builder/scheme-builder.js";
import type { TextSpan } from "./span.js";

export type { SchemeKind } from "../builder/scheme-builder.js";

/**
 * Parsed scheme. `http` and `https` are recognized case-insensitively and reported with
 * a dedicated kind; everything else is `other` with the name exactly as written.
 */
export class Scheme {
  constructor(
    readonly kind: SchemeKind,
    readonly raw: string,
    readonly span: TextSpan,
  ) {}

  /** `http`/`https` for the fast-path kinds, otherwise the raw text. */
  get name(): string {
    return this.kind === "other" ? this.raw : this.kind;
  }

  builder(): SchemeBuilder {
    return new SchemeBuilder(this.kind, this.name);
  }

  toString(): string {
    return this.raw;
  }
}
