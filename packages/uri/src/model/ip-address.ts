/* =======================================================================================
 * IP address values
 * ---------------------------------------------------------------------------------------
 * Typed values carried by IPv4/IPv6 hosts. They are built from text the grammar already
 * accepted, so `fromText` only has to assemble numbers; use `parse` for unchecked input.
 * ======================================================================================= */

export type Ipv4Octets = readonly [number, number, number, number];

export class Ipv4Address {
  readonly octets: Ipv4Octets;

  constructor(a: number, b: number, c: number, d: number) {
    for (const octet of [a, b, c, d]) {
      if (!Number.isInteger(octet) || octet < 0 || octet > 255) {
        throw new RangeError(`IPv4 octet out of range: ${octet}`);
      }
    }
    this.octets = [a, b, c, d];
  }

  /** Assemble from dotted-decimal text that matched `IPv4address`. */
  static fromText(text: string): Ipv4Address {
    const parts = text.split(".").map((part) => Number.parseInt(part, 10));
    if (parts.length !== 4) {
      throw new RangeError(`Not a dotted-decimal IPv4 address: ${text}`);
    }
    const [a = 0, b = 0, c = 0, d = 0] = parts;
    return new Ipv4Address(a, b, c, d);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.octets);
  }

  equals(other: Ipv4Address): boolean {
    return this.octets.every((octet, i) => octet === other.octets[i]);
  }

  toString(): string {
    return this.octets.join(".");
  }
}

export class Ipv6Address {
  readonly #bytes: Uint8Array;

  constructor(bytes: ArrayLike<number>) {
    if (bytes.length !== 16) {
      throw new RangeError(`IPv6 address needs 16 bytes, got ${bytes.length}`);
    }
    this.#bytes = Uint8Array.from(bytes);
  }

  /** Build from eight 16-bit groups. */
  static fromGroups(groups: readonly number[]): Ipv6Address {
    if (groups.length !== 8) {
      throw new RangeError(`IPv6 address needs 8 groups, got ${groups.length}`);
    }
    const bytes = new Uint8Array(16);
    groups.forEach((group, i) => {
      bytes[i * 2] = (group >> 8) & 0xff;
      bytes[i * 2 + 1] = group & 0xff;
    });
    return new Ipv6Address(bytes);
  }

  /**
   * Assemble from text that matched `IPv6address` (without brackets).
   * Handles `::` elision and a trailing embedded IPv4 address.
   */
  static fromText(text: string): Ipv6Address {
    const elision = text.indexOf("::");
    const head = elision < 0 ? text : text.slice(0, elision);
    const tail = elision < 0 ? "" : text.slice(elision + 2);

    const headGroups = splitGroups(head);
    const tailGroups = splitGroups(tail);
    const missing = 8 - headGroups.length - tailGroups.length;
    if (missing < 0 || (elision < 0 && missing !== 0)) {
      throw new RangeError(`Not an IPv6 address: ${text}`);
    }
    return Ipv6Address.fromGroups([...headGroups, ...new Array<number>(missing).fill(0), ...tailGroups]);
  }

  get bytes(): Uint8Array {
    return Uint8Array.from(this.#bytes);
  }

  groups(): number[] {
    const groups: number[] = [];
    for (let i = 0; i < 16; i += 2) {
      groups.push(((this.#bytes[i] ?? 0) << 8) | (this.#bytes[i + 1] ?? 0));
    }
    return groups;
  }

  /** `::ffff:a.b.c.d` */
  isIpv4Mapped(): boolean {
    for (let i = 0; i < 10; i++) {
      if (this.#bytes[i] !== 0) return false;
    }
    return this.#bytes[10] === 0xff && this.#bytes[11] === 0xff;
  }

  equals(other: Ipv6Address): boolean {
    const bytes = other.#bytes;
    return this.#bytes.every((byte, i) => byte === bytes[i]);
  }

  /** RFC 5952 text: lower-case hex, longest zero run (two groups or more) elided. */
  toString(): string {
    if (this.isIpv4Mapped()) {
      return `::ffff:${Array.from(this.#bytes.subarray(12)).join(".")}`;
    }

    const groups = this.groups();
    let bestStart = -1;
    let bestLength = 0;
    for (let i = 0; i < groups.length; ) {
      if (groups[i] !== 0) {
        i++;
        continue;
      }
      let j = i;
      while (j < groups.length && groups[j] === 0) j++;
      if (j - i > bestLength) {
        bestStart = i;
        bestLength = j - i;
      }
      i = j;
    }

    const hex = (list: number[]) => list.map((group) => group.toString(16)).join(":");
    if (bestLength < 2) return hex(groups);
    return `${hex(groups.slice(0, bestStart))}::${hex(groups.slice(bestStart + bestLength))}`;
  }
}

function splitGroups(text: string): number[] {
  if (text === "") return [];
  const groups: number[] = [];
  for (const piece of text.split(":")) {
    if (piece.includes(".")) {
      const [a, b, c, d] = Ipv4Address.fromText(piece).octets;
      groups.push((a << 8) | b, (c << 8) | d);
    } else {
      groups.push(Number.parseInt(piece, 16));
    }
  }
  return groups;
}
