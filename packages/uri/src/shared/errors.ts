/* =======================================================================================
 * ERRORS
 * ---------------------------------------------------------------------------------------
 * Every error raised by the library is a UriError carrying a stable `code` plus a small
 * read-only data record, so callers can route on the code without parsing messages.
 * ======================================================================================= */

export type UriErrorCode = "uri/parse" | "uri/decode" | "uri/build";

/** Top-level grammar productions that have a public entry point. */
export type UriProduction = "URI" | "URI-reference" | "relative-ref" | "path";

export class UriError<
  TCode extends UriErrorCode = UriErrorCode,
  TData extends Record<string, unknown> = Record<string, unknown>,
> extends Error {
  readonly code: TCode;
  readonly data: Readonly<TData>;

  constructor(code: TCode, message: string, data: TData) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
  }
}

/** The input does not match the requested production. No offset is exposed. */
export class UriParseError extends UriError<"uri/parse", { production: UriProduction; input: string }> {
  constructor(production: UriProduction, input: string) {
    super("uri/parse", `Parsing failed: ${JSON.stringify(input)} is not a valid ${production}`, { production, input });
  }

  get production(): UriProduction {
    return this.data.production;
  }

  get input(): string {
    return this.data.input;
  }
}

export class PercentDecodeError extends UriError<"uri/decode", { input: string; sequence: string }> {
  constructor(input: string, sequence: string, reason: string) {
    super("uri/decode", `Invalid percent-encoding ${JSON.stringify(sequence)}: ${reason}`, { input, sequence });
  }

  get input(): string {
    return this.data.input;
  }

  get sequence(): string {
    return this.data.sequence;
  }
}

export class UriBuildError extends UriError<"uri/build", { field: string; value: unknown }> {
  constructor(field: string, value: unknown, reason: string) {
    super("uri/build", `Cannot serialize ${field}: ${reason}`, { field, value });
  }
}

/** Result shape of the non-throwing entry points. */
export type UriResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: UriParseError };
