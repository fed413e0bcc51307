import { UriBuilder, UriRelativeReferenceBuilder } from "../builder/uri-builder.js";
import { debug } from "../shared/debug.js";
import type { Authority } from "./authority.js";
import type { Path } from "./path.js";
import type { Fragment, Query } from "./query.js";
import type { Scheme } from "./scheme.js";
import type { TextSpan } from "./span.js";

/** URI = scheme ":" hier-part [ "?" query ] [ "#" fragment ] */
export class Uri {
  readonly kind = "uri";

  constructor(
    /** Exactly the text the grammar consumed. */
    readonly raw: string,
    readonly span: TextSpan,
    readonly scheme: Scheme,
    /** Present only when the hier-part matched the `"//" authority path-abempty` form. */
    readonly authority: Authority | null,
    readonly path: Path,
    readonly query: Query | null,
    readonly fragment: Fragment | null,
  ) {}

  /**
   * Decode into an owned, mutable builder tree.
   * @throws PercentDecodeError when any user-content field holds malformed percent-encoding.
   */
  builder(): UriBuilder {
    debug.build("uri", { raw: this.raw });
    return new UriBuilder({
      scheme: this.scheme.builder(),
      authority: this.authority?.builder() ?? null,
      path: this.path.builder(),
      query: this.query?.builder() ?? null,
      fragment: this.fragment?.builder() ?? null,
    });
  }

  toString(): string {
    return this.raw;
  }
}

/** relative-ref = relative-part [ "?" query ] [ "#" fragment ] */
export class UriRelativeReference {
  readonly kind = "relative-ref";

  constructor(
    readonly raw: string,
    readonly span: TextSpan,
    readonly authority: Authority | null,
    readonly path: Path,
    readonly query: Query | null,
    readonly fragment: Fragment | null,
  ) {}

  builder(): UriRelativeReferenceBuilder {
    debug.build("relative-ref", { raw: this.raw });
    return new UriRelativeReferenceBuilder({
      authority: this.authority?.builder() ?? null,
      path: this.path.builder(),
      query: this.query?.builder() ?? null,
      fragment: this.fragment?.builder() ?? null,
    });
  }

  toString(): string {
    return this.raw;
  }
}

/** URI-reference = URI / relative-ref, told apart by `kind`. */
export type UriReference = Uri | UriRelativeReference;
