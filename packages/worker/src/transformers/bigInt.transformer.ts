import { ValueTransformer } from "typeorm";

export const bigIntTransformer: ValueTransformer = {
  to(value: bigint | null | undefined): string | null | undefined {
    if (value === null || value === undefined) {
      return value;
    }
    return value.toString();
  },
  from(value: string | null): bigint | null {
    if (value === null) {
      return null;
    }
    return BigInt(value);
  },
};
