import { percentEncode, percentEncodeInto } from "../codec/percent.js";
import type { Ipv4Address, Ipv6Address } from "../model/ip-address.js";
import { UriBuildError } from "../shared/errors.js";

export class UserInfoBuilder {
  constructor(
    public username = "",
    public password: string | null = null,
  ) {}

  toString(): string {
    const out: string[] = [];
    percentEncodeInto(this.username, out);
    if (this.password !== null) {
      out.push(":");
      percentEncodeInto(this.password, out);
    }
    return out.join("");
  }
}

export class RegistryNameBuilder {
  readonly kind = "reg-name";

  constructor(public hostname = "localhost") {}

  toString(): string {
    return percentEncode(this.hostname);
  }
}

export class Ipv4HostBuilder {
  readonly kind = "ipv4";

  constructor(public address: Ipv4Address) {}

  toString(): string {
    return this.address.toString();
  }
}

export class Ipv6HostBuilder {
  readonly kind = "ipv6";

  constructor(public address: Ipv6Address) {}

  toString(): string {
    return `[${this.address.toString()}]`;
  }
}

/** IPvFuture literals are opaque: the text is kept exactly as given. */
export class IpvFutureHostBuilder {
  readonly kind = "ipvfuture";

  constructor(public address: string) {}

  toString(): string {
    return `[${this.address}]`;
  }
}

export type HostBuilder = RegistryNameBuilder | Ipv4HostBuilder | Ipv6HostBuilder | IpvFutureHostBuilder;

export class AuthorityBuilder {
  constructor(
    public host: HostBuilder = new RegistryNameBuilder(),
    public port: number | null = null,
    public userinfo: UserInfoBuilder | null = null,
  ) {}

  /** Rendered without the leading `//`; the URI builders add it. */
  toString(): string {
    let out = "";
    if (this.userinfo) out += `${this.userinfo.toString()}@`;
    out += this.host.toString();
    if (this.port !== null) {
      if (!Number.isInteger(this.port) || this.port < 0 || this.port > 65535) {
        throw new UriBuildError("port", this.port, "expected an integer in 0..65535");
      }
      out += `:${this.port}`;
    }
    return out;
  }
}
