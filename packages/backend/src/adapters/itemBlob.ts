import type { RawItem } from '@hoardsync/domain';
import { ParsingError } from '../httpError.js';

/** Turns the base64 inventory blob carried by a chest object into raw item records. */
export type ItemBlobDecoder = (blob: string) => RawItem[] | Promise<RawItem[]>;

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const SOURCE = 'item blob';

class BlobReader {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  private take(size: number): number {
    if (this.offset + size > this.buffer.length) {
      throw new ParsingError(SOURCE, `unexpected end of data at byte ${this.offset}`);
    }

    const start = this.offset;
    this.offset += size;
    return start;
  }

  int32(): number {
    return this.buffer.readInt32LE(this.take(4));
  }

  int64(): bigint {
    return this.buffer.readBigInt64LE(this.take(8));
  }

  float32(): number {
    return this.buffer.readFloatLE(this.take(4));
  }

  bool(): boolean {
    return this.buffer.readUInt8(this.take(1)) !== 0;
  }

  count(what: string): number {
    const value = this.int32();

    if (value < 0) {
      throw new ParsingError(SOURCE, `negative ${what} count ${value}`);
    }

    return value;
  }

  // Length prefix is a 7-bit encoded integer, at most five bytes.
  string(): string {
    let length = 0;

    for (let shift = 0; ; shift += 7) {
      if (shift > 28) {
        throw new ParsingError(SOURCE, 'string length prefix is too long');
      }

      const byte = this.buffer.readUInt8(this.take(1));
      length |= (byte & 0x7f) << shift;

      if ((byte & 0x80) === 0) {
        break;
      }
    }

    if (length < 0) {
      throw new ParsingError(SOURCE, 'string length overflows');
    }

    const start = this.take(length);
    return this.buffer.toString('utf8', start, start + length);
  }
}

const decodeBase64 = (blob: string): Buffer => {
  const compact = blob.replace(/\s+/g, '');

  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ParsingError(SOURCE, 'malformed base64');
  }

  return Buffer.from(compact, 'base64');
};

const readItem = (reader: BlobReader, version: number): RawItem => {
  const item: RawItem = {
    name: reader.string(),
    stack: reader.int32(),
    durability: reader.float32(),
    pos_x: reader.int32(),
    pos_y: reader.int32(),
    equipped: reader.bool(),
    quality: 1,
    variant: 0,
    crafter_id: '0'
  };

  if (version >= 101) {
    item.quality = reader.int32();
  }

  if (version >= 102) {
    item.variant = reader.int32();
  }

  if (version >= 103) {
    item.crafter_id = reader.int64().toString();
    const crafterName = reader.string();
    if (crafterName) {
      item.crafter_name = crafterName;
    }
  }

  if (version >= 104) {
    const entries = reader.count('custom data');
    for (let index = 0; index < entries; index += 1) {
      reader.string();
      reader.string();
    }
  }

  if (version >= 105) {
    reader.int32();
  }

  if (version >= 106) {
    reader.bool();
  }

  return item;
};

export const decodeItemBlob: ItemBlobDecoder = (blob) => {
  if (blob.trim().length === 0) {
    return [];
  }

  const reader = new BlobReader(decodeBase64(blob));
  const version = reader.int32();
  const count = reader.count('item');
  const items: RawItem[] = [];

  for (let index = 0; index < count; index += 1) {
    items.push(readItem(reader, version));
  }

  return items;
};
