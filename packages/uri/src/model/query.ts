import { FragmentBuilder } from "../builder/fragment-builder.js";
import { QueryBuilder, type QueryParameter } from "../builder/query-builder.js";
import { percentDecode } from "../codec/percent.js";
import type { TextSpan } from "./span.js";

export type RawQueryParameter = readonly [key: string, values: readonly string[]];

/**
 * Query component (without the leading `?`). `parameters` is the secondary split of the
 * raw text: pairs separated by `&` or `;`, key and values split on the first `=`, values
 * separated by `,`.
 */
export class Query {
  constructor(
    readonly raw: string,
    readonly span: TextSpan,
    readonly parameters: readonly RawQueryParameter[],
  ) {}

  /** Raw values of the first parameter named `key`. */
  get(key: string): readonly string[] | undefined {
    return this.parameters.find(([k]) => k === key)?.[1];
  }

  builder(): QueryBuilder {
    return new QueryBuilder(
      this.parameters.map(([key, values]): QueryParameter => [percentDecode(key), values.map(percentDecode)]),
    );
  }

  toString(): string {
    return this.raw;
  }
}

/** Fragment component (without the leading `#`). */
export class Fragment {
  constructor(
    readonly raw: string,
    readonly span: TextSpan,
  ) {}

  builder(): FragmentBuilder {
    return new FragmentBuilder(percentDecode(this.raw));
  }

  toString(): string {
    return this.raw;
  }
}
