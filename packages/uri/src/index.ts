// URI package public API
//
// Parse into read-only views that keep the raw text, convert them to owned builders with
// builder(), and render builders back with toString().

// === Entry points ===
export {
  parseUri,
  parseUriReference,
  parseRelativeReference,
  parsePath,
  tryParseUri,
  tryParseUriReference,
  tryParseRelativeReference,
  tryParsePath,
} from "./parsing/parse.js";
export { UriParser, splitQueryParameters } from "./parsing/uri-parser.js";

// === Parsed views ===
export { Uri, UriRelativeReference } from "./model/uri.js";
export type { UriReference } from "./model/uri.js";
export { Scheme } from "./model/scheme.js";
export type { SchemeKind } from "./model/scheme.js";
export { Authority, UserInfo, RegistryNameHost, Ipv4Host, Ipv6Host, IpvFutureHost } from "./model/authority.js";
export type { HostInfo, HostKind } from "./model/authority.js";
export { Path } from "./model/path.js";
export type { PathKind } from "./model/path.js";
export { Query, Fragment } from "./model/query.js";
export type { RawQueryParameter } from "./model/query.js";
export { Ipv4Address, Ipv6Address } from "./model/ip-address.js";
export type { Ipv4Octets } from "./model/ip-address.js";
export { sliceSpan } from "./model/span.js";
export type { TextSpan } from "./model/span.js";

// === Builders ===
export { SchemeBuilder } from "./builder/scheme-builder.js";
export {
  AuthorityBuilder,
  UserInfoBuilder,
  RegistryNameBuilder,
  Ipv4HostBuilder,
  Ipv6HostBuilder,
  IpvFutureHostBuilder,
} from "./builder/authority-builder.js";
export type { HostBuilder } from "./builder/authority-builder.js";
export { PathBuilder } from "./builder/path-builder.js";
export type { PathBuilderKind } from "./builder/path-builder.js";
export { QueryBuilder } from "./builder/query-builder.js";
export type { QueryParameter } from "./builder/query-builder.js";
export { FragmentBuilder } from "./builder/fragment-builder.js";
export { UriBuilder, UriRelativeReferenceBuilder } from "./builder/uri-builder.js";
export type { UriBuilderInit, UriReferenceBuilder } from "./builder/uri-builder.js";

// === Codec / character classes ===
export { percentEncode, percentEncodeInto, percentDecode } from "./codec/percent.js";
export {
  isAlpha,
  isDigit,
  isHexDigit,
  hexValue,
  isUnreserved,
  isSubDelim,
  isGenDelim,
  isReserved,
  isSchemeChar,
  isPcharUnit,
} from "./grammar/chars.js";

// === Errors / debug ===
export { UriError, UriParseError, PercentDecodeError, UriBuildError } from "./shared/errors.js";
export type { UriErrorCode, UriProduction, UriResult } from "./shared/errors.js";
export { getDebugChannel, refreshDebugChannels, configureDebug, isDebugEnabled } from "./shared/debug.js";
export type { DebugChannel, DebugConfig, DebugData } from "./shared/debug.js";
