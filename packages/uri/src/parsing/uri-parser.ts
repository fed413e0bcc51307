/* =======================================================================================
 * URI GRAMMAR
 * ---------------------------------------------------------------------------------------
 * RFC 3986 productions as ordered alternatives over a Cursor.
 *
 * Every production either returns a value and leaves the cursor after what it matched,
 * or returns null/false and leaves the cursor where it started. Alternatives are tried
 * in the order written here; the first one that matches wins.
 * ======================================================================================= */

import {
  CharCode,
  isAlpha,
  isDigit,
  isHexDigit,
  isPcharUnit,
  isSchemeChar,
  isSubDelim,
  isUnreserved,
} from "../grammar/chars.js";
import { Authority, Ipv4Host, Ipv6Host, IpvFutureHost, RegistryNameHost, UserInfo, type HostInfo } from "../model/authority.js";
import { Ipv4Address, Ipv6Address } from "../model/ip-address.js";
import { Path, type PathKind } from "../model/path.js";
import { Fragment, Query, type RawQueryParameter } from "../model/query.js";
import { Scheme } from "../model/scheme.js";
import type { TextSpan } from "../model/span.js";
import { Uri, UriRelativeReference } from "../model/uri.js";
import { Cursor } from "./cursor.js";

const MAX_PORT = 65535;

/** unreserved / sub-delims (pct-encoded handled by the cursor) */
function isRegNameUnit(ch: number): boolean {
  return isUnreserved(ch) || isSubDelim(ch);
}

function isUserInfoUnit(ch: number): boolean {
  return isRegNameUnit(ch) || ch === CharCode.Colon;
}

/** segment-nz-nc unit: pchar minus ":" */
function isNoColonUnit(ch: number): boolean {
  return isRegNameUnit(ch) || ch === CharCode.At;
}

/** query / fragment unit: pchar / "/" / "?" */
function isQueryUnit(ch: number): boolean {
  return isPcharUnit(ch) || ch === CharCode.Slash || ch === CharCode.Question;
}

/**
 * IPv6address shapes from RFC 3986 section 3.2.2, in order.
 *
 * `prefix` is the most h16 groups allowed before "::" (null: no "::" at all),
 * `pairs` the count of `h16 ":"` after it, `tail` what closes the address.
 */
interface Ipv6Shape {
  readonly prefix: number | null;
  readonly pairs: number;
  readonly tail: "ls32" | "h16" | "none";
}

const IPV6_SHAPES: readonly Ipv6Shape[] = [
  { prefix: null, pairs: 6, tail: "ls32" },
  { prefix: 0, pairs: 5, tail: "ls32" },
  { prefix: 1, pairs: 4, tail: "ls32" },
  { prefix: 2, pairs: 3, tail: "ls32" },
  { prefix: 3, pairs: 2, tail: "ls32" },
  { prefix: 4, pairs: 1, tail: "ls32" },
  { prefix: 5, pairs: 0, tail: "ls32" },
  { prefix: 6, pairs: 0, tail: "h16" },
  { prefix: 7, pairs: 0, tail: "none" },
];

interface HierPart {
  readonly authority: Authority | null;
  readonly path: Path;
}

/**
 * Split the raw query text into parameters: pairs separated by `&` or `;` (empty pairs
 * dropped), key and values split on the first `=`, values separated by `,`.
 */
export function splitQueryParameters(raw: string): RawQueryParameter[] {
  const parameters: RawQueryParameter[] = [];
  for (const pair of raw.split(/[&;]/)) {
    if (pair === "") continue;
    const eq = pair.indexOf("=");
    if (eq < 0) {
      parameters.push([pair, []]);
    } else {
      parameters.push([pair.slice(0, eq), pair.slice(eq + 1).split(",")]);
    }
  }
  return parameters;
}

export class UriParser {
  readonly #c: Cursor;

  constructor(readonly source: string) {
    this.#c = new Cursor(source);
  }

  // ---------------------------------------------------------------------------------------
  // Top-level entries (whole input must be consumed)
  // ---------------------------------------------------------------------------------------

  parseUri(): Uri | null {
    this.#c.pos = 0;
    const uri = this.uri();
    return uri !== null && this.#c.atEnd ? uri : null;
  }

  parseRelativeReference(): UriRelativeReference | null {
    this.#c.pos = 0;
    const ref = this.relativeRef();
    return ref !== null && this.#c.atEnd ? ref : null;
  }

  /** URI-reference = URI / relative-ref */
  parseUriReference(): Uri | UriRelativeReference | null {
    return this.parseUri() ?? this.parseRelativeReference();
  }

  /** path-absolute / path-rootless / path-abempty / path-empty, each against the whole input */
  parsePath(): Path | null {
    const alternatives = [
      () => this.pathAbsolute(),
      () => this.pathRootless(),
      () => this.pathAbempty(),
      () => this.pathEmpty(),
    ];
    for (const alternative of alternatives) {
      this.#c.pos = 0;
      const path = alternative();
      if (path !== null && this.#c.atEnd) return path;
    }
    return null;
  }

  // ---------------------------------------------------------------------------------------
  // Composites
  // ---------------------------------------------------------------------------------------

  /** URI = scheme ":" hier-part [ "?" query ] [ "#" fragment ] */
  uri(): Uri | null {
    const c = this.#c;
    const start = c.pos;
    const scheme = this.scheme();
    if (scheme === null || !c.eat(CharCode.Colon)) {
      c.pos = start;
      return null;
    }
    const hier = this.hierPart(true);
    if (hier === null) {
      c.pos = start;
      return null;
    }
    const query = this.query();
    const fragment = this.fragment();
    return new Uri(c.slice(start), this.#span(start), scheme, hier.authority, hier.path, query, fragment);
  }

  /** relative-ref = relative-part [ "?" query ] [ "#" fragment ] */
  relativeRef(): UriRelativeReference | null {
    const c = this.#c;
    const start = c.pos;
    const part = this.hierPart(false);
    if (part === null) {
      c.pos = start;
      return null;
    }
    const query = this.query();
    const fragment = this.fragment();
    return new UriRelativeReference(c.slice(start), this.#span(start), part.authority, part.path, query, fragment);
  }

  /**
   * hier-part     = "//" authority path-abempty / path-absolute / path-rootless / path-empty
   * relative-part = "//" authority path-abempty / path-absolute / path-noscheme / path-empty
   */
  hierPart(rootless: boolean): HierPart | null {
    const c = this.#c;
    if (c.eatLiteral("//")) {
      const authority = this.authority();
      return { authority, path: this.pathAbempty() };
    }
    const path =
      this.pathAbsolute() ?? (rootless ? this.pathRootless() : this.pathNoscheme()) ?? this.pathEmpty();
    return path === null ? null : { authority: null, path };
  }

  /** authority = [ userinfo "@" ] host [ ":" port ]; always matches (host may be empty). */
  authority(): Authority {
    const c = this.#c;
    const start = c.pos;

    let userinfo = this.userinfo();
    if (userinfo !== null && !c.eat(CharCode.At)) {
      userinfo = null;
      c.pos = start;
    }

    const host = this.host();

    let port: number | null = null;
    const beforePort = c.pos;
    if (c.eat(CharCode.Colon)) {
      port = this.port();
      if (port === null) c.pos = beforePort;
    }

    return new Authority(c.slice(start), this.#span(start), userinfo, host, port);
  }

  // ---------------------------------------------------------------------------------------
  // Leaves
  // ---------------------------------------------------------------------------------------

  /**
   * scheme = ALPHA *( ALPHA / DIGIT / "+" / "-" / "." )
   *
   * `http` and `https` are matched case-insensitively first and taken only when no
   * further scheme character follows, so `httpx` still parses as an ordinary scheme.
   */
  scheme(): Scheme | null {
    const c = this.#c;
    const start = c.pos;
    if (!isAlpha(c.peek())) return null;

    for (const kind of ["https", "http"] as const) {
      if (c.eatLiteralIgnoreCase(kind) && !isSchemeChar(c.peek())) {
        return new Scheme(kind, c.slice(start), this.#span(start));
      }
      c.pos = start;
    }

    c.pos++;
    while (isSchemeChar(c.peek())) c.pos++;
    return new Scheme("other", c.slice(start), this.#span(start));
  }

  /**
   * userinfo = *( unreserved / pct-encoded / sub-delims / ":" )
   *
   * Taken only when an "@" follows (the "@" itself is left for the caller). The matched
   * text is then split at its first ":" into username and password.
   */
  userinfo(): UserInfo | null {
    const c = this.#c;
    const start = c.pos;
    c.eatRun(isUserInfoUnit);
    if (c.peek() !== CharCode.At) {
      c.pos = start;
      return null;
    }

    const raw = c.slice(start);
    const span = this.#span(start);
    const colon = raw.indexOf(":");
    const username = colon < 0 ? raw : raw.slice(0, colon);
    if (username === "") {
      return new UserInfo("unparsed", raw, span, null, null);
    }
    const password = colon < 0 ? "" : raw.slice(colon + 1);
    return new UserInfo("parsed", raw, span, username, password === "" ? null : password);
  }

  /** host = IP-literal / IPv4address / reg-name */
  host(): HostInfo {
    return this.ipLiteral() ?? this.ipv4Host() ?? this.regName();
  }

  /** IP-literal = "[" ( IPv6address / IPvFuture ) "]" */
  ipLiteral(): Ipv6Host | IpvFutureHost | null {
    const c = this.#c;
    const open = c.pos;
    if (!c.eat(CharCode.OpenBracket)) return null;
    const start = c.pos;

    if (this.ipv6Address()) {
      const raw = c.slice(start);
      const span = this.#span(start);
      c.pos++; // "]"
      return new Ipv6Host(raw, span, Ipv6Address.fromText(raw));
    }

    if (this.ipvFuture() && c.peek() === CharCode.CloseBracket) {
      const raw = c.slice(start);
      const span = this.#span(start);
      c.pos++;
      return new IpvFutureHost(raw, span);
    }

    c.pos = open;
    return null;
  }

  /**
   * IPv6address, tried shape by shape. A shape counts only when "]" follows it, so a
   * shorter shape cannot shadow a longer one.
   */
  ipv6Address(): boolean {
    const c = this.#c;
    const start = c.pos;
    for (const shape of IPV6_SHAPES) {
      if (this.#ipv6Shape(shape) && c.peek() === CharCode.CloseBracket) return true;
      c.pos = start;
    }
    return false;
  }

  #ipv6Shape(shape: Ipv6Shape): boolean {
    const c = this.#c;
    if (shape.prefix !== null) {
      // [ *(prefix-1)( h16 ":" ) h16 ] "::"
      let groups = 0;
      if (shape.prefix > 0 && this.h16()) {
        groups = 1;
        while (groups < shape.prefix && c.peek() === CharCode.Colon && c.peek(1) !== CharCode.Colon) {
          const save = c.pos;
          c.pos++;
          if (!this.h16()) {
            c.pos = save;
            break;
          }
          groups++;
        }
      }
      if (!c.eatLiteral("::")) return false;
    }

    for (let i = 0; i < shape.pairs; i++) {
      if (!this.h16() || !c.eat(CharCode.Colon)) return false;
    }

    switch (shape.tail) {
      case "ls32":
        return this.ls32();
      case "h16":
        return this.h16();
      case "none":
        return true;
    }
  }

  /** h16 = 1*4HEXDIG */
  h16(): boolean {
    const c = this.#c;
    let count = 0;
    while (count < 4 && isHexDigit(c.peek())) {
      c.pos++;
      count++;
    }
    return count > 0;
  }

  /** ls32 = ( h16 ":" h16 ) / IPv4address */
  ls32(): boolean {
    const c = this.#c;
    const start = c.pos;
    if (this.h16() && c.eat(CharCode.Colon) && this.h16()) return true;
    c.pos = start;
    return this.ipv4Address();
  }

  /** IPvFuture = "v" 1*HEXDIG "." 1*( unreserved / sub-delims / ":" ) */
  ipvFuture(): boolean {
    const c = this.#c;
    const start = c.pos;
    if ((c.peek() | 0x20) !== CharCode.LowercaseV) return false;
    c.pos++;
    if (!this.h16Run() || !c.eat(CharCode.Dot) || c.eatRun(isUserInfoUnit, false) === 0) {
      c.pos = start;
      return false;
    }
    return true;
  }

  /** 1*HEXDIG */
  h16Run(): boolean {
    const c = this.#c;
    const start = c.pos;
    while (isHexDigit(c.peek())) c.pos++;
    return c.pos > start;
  }

  /**
   * IPv4address as a host: only when the address is not just the head of a longer
   * reg-name (`1.2.3.4.example` is a reg-name).
   */
  ipv4Host(): Ipv4Host | null {
    const c = this.#c;
    const start = c.pos;
    if (!this.ipv4Address() || c.isPctEncoded() || isRegNameUnit(c.peek())) {
      c.pos = start;
      return null;
    }
    const raw = c.slice(start);
    return new Ipv4Host(raw, this.#span(start), Ipv4Address.fromText(raw));
  }

  /** IPv4address = dec-octet "." dec-octet "." dec-octet "." dec-octet */
  ipv4Address(): boolean {
    const c = this.#c;
    const start = c.pos;
    for (let i = 0; i < 4; i++) {
      if ((i > 0 && !c.eat(CharCode.Dot)) || !this.decOctet()) {
        c.pos = start;
        return false;
      }
    }
    return true;
  }

  /**
   * dec-octet = "25" %x30-35 / "2" %x30-34 DIGIT / "1" 2DIGIT / %x31-39 DIGIT / DIGIT
   *
   * Longest form first; a leading zero only ever matches the single-digit form.
   */
  decOctet(): boolean {
    const c = this.#c;
    const d0 = c.peek();
    const d1 = c.peek(1);
    const d2 = c.peek(2);
    if (!isDigit(d0)) return false;

    if (d0 === CharCode.Two && d1 === CharCode.Five && d2 >= CharCode.Zero && d2 <= CharCode.Five) {
      c.pos += 3;
    } else if (d0 === CharCode.Two && d1 >= CharCode.Zero && d1 <= CharCode.Four && isDigit(d2)) {
      c.pos += 3;
    } else if (d0 === CharCode.One && isDigit(d1) && isDigit(d2)) {
      c.pos += 3;
    } else if (d0 !== CharCode.Zero && isDigit(d1)) {
      c.pos += 2;
    } else {
      c.pos += 1;
    }
    return true;
  }

  /** reg-name = *( unreserved / pct-encoded / sub-delims ) */
  regName(): RegistryNameHost {
    const c = this.#c;
    const start = c.pos;
    c.eatRun(isRegNameUnit);
    return new RegistryNameHost(c.slice(start), this.#span(start));
  }

  /** port = 1*DIGIT, decimal, at most 65535 */
  port(): number | null {
    const c = this.#c;
    const start = c.pos;
    while (isDigit(c.peek())) c.pos++;
    if (c.pos === start) return null;
    const value = Number(c.slice(start));
    if (value > MAX_PORT) {
      c.pos = start;
      return null;
    }
    return value;
  }

  /** path-abempty = *( "/" segment ); reported by the most specific kind its text fits. */
  pathAbempty(): Path {
    const c = this.#c;
    const start = c.pos;
    const segments: string[] = [];
    while (c.eat(CharCode.Slash)) {
      segments.push(this.segment());
    }
    if (segments.length === 0) return Path.empty(start);
    const kind: PathKind = segments[0] === "" && segments.length > 1 ? "abempty" : "absolute";
    return this.#path(kind, start, segments);
  }

  /** path-absolute = "/" [ segment-nz *( "/" segment ) ] */
  pathAbsolute(): Path | null {
    const c = this.#c;
    const start = c.pos;
    if (!c.eat(CharCode.Slash)) return null;
    const first = this.segmentNz();
    if (first === null) return this.#path("absolute", start, [""]);
    return this.#path("absolute", start, [first, ...this.#moreSegments()]);
  }

  /** path-noscheme = segment-nz-nc *( "/" segment ) */
  pathNoscheme(): Path | null {
    const c = this.#c;
    const start = c.pos;
    if (c.eatRun(isNoColonUnit) === 0) return null;
    const first = c.slice(start);
    return this.#path("noscheme", start, [first, ...this.#moreSegments()]);
  }

  /** path-rootless = segment-nz *( "/" segment ) */
  pathRootless(): Path | null {
    const start = this.#c.pos;
    const first = this.segmentNz();
    if (first === null) return null;
    return this.#path("rootless", start, [first, ...this.#moreSegments()]);
  }

  /** path-empty = 0<pchar>; matches only where no pchar follows. */
  pathEmpty(): Path | null {
    return this.#c.atPchar() ? null : Path.empty(this.#c.pos);
  }

  /** segment = *pchar */
  segment(): string {
    const c = this.#c;
    const start = c.pos;
    c.eatRun(isPcharUnit);
    return c.slice(start);
  }

  /** segment-nz = 1*pchar */
  segmentNz(): string | null {
    const segment = this.segment();
    return segment === "" ? null : segment;
  }

  /** [ "?" query ] */
  query(): Query | null {
    const c = this.#c;
    if (!c.eat(CharCode.Question)) return null;
    const start = c.pos;
    c.eatRun(isQueryUnit);
    const raw = c.slice(start);
    return new Query(raw, this.#span(start), splitQueryParameters(raw));
  }

  /** [ "#" fragment ] */
  fragment(): Fragment | null {
    const c = this.#c;
    if (!c.eat(CharCode.Hash)) return null;
    const start = c.pos;
    c.eatRun(isQueryUnit);
    return new Fragment(c.slice(start), this.#span(start));
  }

  #moreSegments(): string[] {
    const segments: string[] = [];
    while (this.#c.eat(CharCode.Slash)) {
      segments.push(this.segment());
    }
    return segments;
  }

  #path(kind: PathKind, start: number, segments: string[]): Path {
    return new Path(kind, this.#c.slice(start), this.#span(start), segments);
  }

  #span(start: number): TextSpan {
    return { start, end: this.#c.pos };
  }
}
