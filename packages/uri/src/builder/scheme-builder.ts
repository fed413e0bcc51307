export type SchemeKind = "http" | "https" | "other";

/** Owned, mutable scheme. Rendered as-is, schemes never carry percent-encoding. */
export class SchemeBuilder {
  constructor(
    public kind: SchemeKind = "other",
    public name: string = "scheme",
  ) {}

  /** Pick the http/https variants case-insensitively, anything else is kept verbatim. */
  static of(name: string): SchemeBuilder {
    const lower = name.toLowerCase();
    if (lower === "http" || lower === "https") return new SchemeBuilder(lower, lower);
    return new SchemeBuilder("other", name);
  }

  toString(): string {
    return this.kind === "other" ? this.name : this.kind;
  }
}
