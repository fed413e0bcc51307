import { percentEncode } from "../codec/percent.js";

export class FragmentBuilder {
  constructor(public value = "") {}

  toString(): string {
    return percentEncode(this.value);
  }
}
