import type { AuthorityBuilder } from "./authority-builder.js";
import type { FragmentBuilder } from "./fragment-builder.js";
import { PathBuilder } from "./path-builder.js";
import type { QueryBuilder } from "./query-builder.js";
import { SchemeBuilder } from "./scheme-builder.js";

export interface UriBuilderInit {
  scheme?: SchemeBuilder;
  authority?: AuthorityBuilder | null;
  path?: PathBuilder;
  query?: QueryBuilder | null;
  fragment?: FragmentBuilder | null;
}

/**
 * Shared tail of both URI shapes: `["//" authority] path ["?" query] ["#" fragment]`.
 *
 * After an authority a non-empty path is rooted, so `child()` on the empty path of
 * `http://host` renders `http://host/x`. Without an authority a path starting with `//`
 * gets a `/.` prefix so it does not read back as an authority.
 */
function renderReference(
  authority: AuthorityBuilder | null,
  path: PathBuilder,
  query: QueryBuilder | null,
  fragment: FragmentBuilder | null,
): string {
  let out = "";
  let rendered = path.toString();
  if (authority) {
    out += `//${authority.toString()}`;
    if (rendered !== "" && !rendered.startsWith("/")) rendered = `/${rendered}`;
  } else if (rendered.startsWith("//")) {
    rendered = `/.${rendered}`;
  }
  out += rendered;
  if (query) out += `?${query.toString()}`;
  if (fragment) out += `#${fragment.toString()}`;
  return out;
}

export class UriBuilder {
  readonly kind = "uri";
  scheme: SchemeBuilder;
  authority: AuthorityBuilder | null;
  path: PathBuilder;
  query: QueryBuilder | null;
  fragment: FragmentBuilder | null;

  constructor(init: UriBuilderInit = {}) {
    this.scheme = init.scheme ?? new SchemeBuilder();
    this.authority = init.authority ?? null;
    this.path = init.path ?? new PathBuilder();
    this.query = init.query ?? null;
    this.fragment = init.fragment ?? null;
  }

  toString(): string {
    return `${this.scheme.toString()}:${renderReference(this.authority, this.path, this.query, this.fragment)}`;
  }
}

export class UriRelativeReferenceBuilder {
  readonly kind = "relative-ref";
  authority: AuthorityBuilder | null;
  path: PathBuilder;
  query: QueryBuilder | null;
  fragment: FragmentBuilder | null;

  constructor(init: Omit<UriBuilderInit, "scheme"> = {}) {
    this.authority = init.authority ?? null;
    this.path = init.path ?? new PathBuilder();
    this.query = init.query ?? null;
    this.fragment = init.fragment ?? null;
  }

  toString(): string {
    return renderReference(this.authority, this.path, this.query, this.fragment);
  }
}

/** Builder counterpart of a URI-reference: one of the two shapes, told apart by `kind`. */
export type UriReferenceBuilder = UriBuilder | UriRelativeReferenceBuilder;
