/* =======================================================================================
 * AUTHORITY MODEL
 * ---------------------------------------------------------------------------------------
 * authority = [ userinfo "@" ] host [ ":" port ]
 *
 * Parsed views keep the raw substrings of the input. `builder()` decodes them into an
 * owned AuthorityBuilder tree.
 * ======================================================================================= */

import {
  AuthorityBuilder,
  Ipv4HostBuilder,
  Ipv6HostBuilder,
  IpvFutureHostBuilder,
  RegistryNameBuilder,
  UserInfoBuilder,
  type HostBuilder,
} from "../builder/authority-builder.js";
import { percentDecode } from "../codec/percent.js";
import type { Ipv4Address, Ipv6Address } from "./ip-address.js";
import type { TextSpan } from "./span.js";

/**
 * User information. `parsed` when the span splits into `username [":" password]`,
 * `unparsed` when it does not (for example an empty username before the colon); the raw
 * text is kept either way.
 */
export class UserInfo {
  constructor(
    readonly kind: "parsed" | "unparsed",
    readonly raw: string,
    readonly span: TextSpan,
    readonly username: string | null,
    readonly password: string | null,
  ) {}

  /** An unparsed span becomes a builder whose username is the whole decoded span. */
  builder(): UserInfoBuilder {
    if (this.kind === "unparsed" || this.username === null) {
      return new UserInfoBuilder(percentDecode(this.raw));
    }
    return new UserInfoBuilder(
      percentDecode(this.username),
      this.password === null ? null : percentDecode(this.password),
    );
  }

  toString(): string {
    return this.raw;
  }
}

export class RegistryNameHost {
  readonly kind = "reg-name";

  constructor(
    readonly raw: string,
    readonly span: TextSpan,
  ) {}

  builder(): RegistryNameBuilder {
    return new RegistryNameBuilder(percentDecode(this.raw));
  }

  toString(): string {
    return this.raw;
  }
}

export class Ipv4Host {
  readonly kind = "ipv4";

  constructor(
    readonly raw: string,
    readonly span: TextSpan,
    readonly address: Ipv4Address,
  ) {}

  builder(): Ipv4HostBuilder {
    return new Ipv4HostBuilder(this.address);
  }

  toString(): string {
    return this.raw;
  }
}

/** `raw` and `span` exclude the enclosing brackets; `toString()` puts them back. */
export class Ipv6Host {
  readonly kind = "ipv6";

  constructor(
    readonly raw: string,
    readonly span: TextSpan,
    readonly address: Ipv6Address,
  ) {}

  builder(): Ipv6HostBuilder {
    return new Ipv6HostBuilder(this.address);
  }

  toString(): string {
    return `[${this.raw}]`;
  }
}

export class IpvFutureHost {
  readonly kind = "ipvfuture";

  constructor(
    readonly raw: string,
    readonly span: TextSpan,
  ) {}

  builder(): IpvFutureHostBuilder {
    return new IpvFutureHostBuilder(this.raw);
  }

  toString(): string {
    return `[${this.raw}]`;
  }
}

export type HostInfo = RegistryNameHost | Ipv4Host | Ipv6Host | IpvFutureHost;
export type HostKind = HostInfo["kind"];

export class Authority {
  constructor(
    readonly raw: string,
    readonly span: TextSpan,
    readonly userinfo: UserInfo | null,
    readonly host: HostInfo,
    readonly port: number | null,
  ) {}

  builder(): AuthorityBuilder {
    const host: HostBuilder = this.host.builder();
    return new AuthorityBuilder(host, this.port, this.userinfo?.builder() ?? null);
  }

  toString(): string {
    return this.raw;
  }
}
