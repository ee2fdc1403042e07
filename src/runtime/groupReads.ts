// Merge tag reads into as few requests as the block sizes allow.
import {
  type AddressType,
  MODBUS_DEFAULT_MAX_BITS,
  MODBUS_DEFAULT_MAX_REGS,
} from "../config/constants.ts";
import type { RuntimeTag } from "../config/mapping.ts";
import { READ_FUNCTION_FOR, type ReadFunctionCode } from "../functionCodes.ts";

export type GroupableTag = Pick<
  RuntimeTag,
  "unitId" | "addressType" | "address" | "count"
>;

export interface ReadBatch<T extends GroupableTag = RuntimeTag> {
  unitId: number;
  addressType: AddressType;
  functionCode: ReadFunctionCode;
  start: number;
  count: number;
  tags: T[];
}

const isBitTable = (type: AddressType) =>
  type === "coil" || type === "discrete_input";

/**
 * Tags are bucketed by unit and table and sorted by address; a tag joins
 * the current batch while the batch, including any gap, stays within the
 * limit for its table.
 */
export function groupReads<T extends GroupableTag>(
  tags: readonly T[],
  maxRegs = MODBUS_DEFAULT_MAX_REGS,
  maxBits = MODBUS_DEFAULT_MAX_BITS,
): ReadBatch<T>[] {
  const buckets = new Map<string, T[]>();
  for (const tag of tags) {
    const key = `${tag.unitId}:${tag.addressType}`;
    const bucket = buckets.get(key);
    if (bucket) bucket.push(tag);
    else buckets.set(key, [tag]);
  }

  const batches: ReadBatch<T>[] = [];
  for (const items of buckets.values()) {
    const sorted = [...items].sort((a, b) => a.address - b.address);
    const { addressType, unitId } = sorted[0];
    const max = isBitTable(addressType) ? maxBits : maxRegs;

    let current: ReadBatch<T> | undefined;
    for (const tag of sorted) {
      const tagEnd = tag.address + Math.max(1, tag.count) - 1;
      if (current && tagEnd - current.start + 1 <= max) {
        current.count = Math.max(current.count, tagEnd - current.start + 1);
        current.tags.push(tag);
        continue;
      }
      current = {
        addressType,
        count: tagEnd - tag.address + 1,
        functionCode: READ_FUNCTION_FOR[addressType],
        start: tag.address,
        tags: [tag],
        unitId,
      };
      batches.push(current);
    }
  }
  return batches;
}
