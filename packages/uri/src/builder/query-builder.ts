import { percentEncodeInto } from "../codec/percent.js";

export type QueryParameter = [key: string, values: string[]];

/**
 * Ordered, decoded query parameters. Keys may repeat; each key carries its own value list
 * which serializes comma-separated.
 */
export class QueryBuilder {
  constructor(public parameters: QueryParameter[] = []) {}

  append(key: string, ...values: string[]): this {
    this.parameters.push([key, values]);
    return this;
  }

  /** Values of the first parameter named `key`. */
  get(key: string): string[] | undefined {
    return this.parameters.find(([k]) => k === key)?.[1];
  }

  /** Replace every parameter named `key` with a single one, appended if absent. */
  set(key: string, ...values: string[]): this {
    const index = this.parameters.findIndex(([k]) => k === key);
    if (index < 0) return this.append(key, ...values);
    this.parameters[index] = [key, values];
    this.parameters = this.parameters.filter(([k], i) => i === index || k !== key);
    return this;
  }

  delete(key: string): boolean {
    const before = this.parameters.length;
    this.parameters = this.parameters.filter(([k]) => k !== key);
    return this.parameters.length !== before;
  }

  toString(): string {
    const out: string[] = [];
    this.parameters.forEach(([key, values], i) => {
      if (i > 0) out.push("&");
      percentEncodeInto(key, out);
      if (values.length === 0) return;
      out.push("=");
      values.forEach((value, j) => {
        if (j > 0) out.push(",");
        percentEncodeInto(value, out);
      });
    });
    return out.join("");
  }
}
