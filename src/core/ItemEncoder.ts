import { TextDecoder } from 'util';
import { ImageKind } from '../types/schema';
import { DecodeResult, ErrorCode, fail } from '../types/errors';
import { ok } from '../types/result';

/** Union tags of an item, in declaration order of the item union. */
export enum ItemTag {
  ColorCode = 0,
  URI = 1,
  RawImage = 2
}

export interface EncodedItem {
  readonly kind: ImageKind;
  readonly content: string;
  /** UTF-8 bytes of `content`. */
  readonly payload: Uint8Array;
  /** The full tagged record: u32 tag, u32 payload length, payload. */
  readonly bytes: Uint8Array;
}

export interface DecodedItem {
  readonly kind: ImageKind;
  readonly content: string;
}

const HEADER_SIZE = 4;

export function tagForKind(kind: ImageKind): ItemTag {
  switch (kind) {
    case ImageKind.ColorCode:
      return ItemTag.ColorCode;
    case ImageKind.URI:
      return ItemTag.URI;
    case ImageKind.RawImage:
      return ItemTag.RawImage;
  }
}

function kindForTag(tag: number): ImageKind | undefined {
  switch (tag) {
    case ItemTag.ColorCode:
      return ImageKind.ColorCode;
    case ItemTag.URI:
      return ImageKind.URI;
    case ItemTag.RawImage:
      return ImageKind.RawImage;
    default:
      return undefined;
  }
}

/**
 * Little-endian item list codec.
 *
 * An item list is a dynamic vector: total size, one absolute offset per item,
 * then the items back to back. Each item is a tagged union over a byte vector.
 */
export class ItemEncoder {
  private utf8 = new TextDecoder('utf-8', { fatal: true });

  encodeItem(kind: ImageKind, content: string): EncodedItem {
    const payload = Buffer.from(content, 'utf8');
    const bytes = Buffer.alloc(HEADER_SIZE * 2 + payload.length);
    bytes.writeUInt32LE(tagForKind(kind), 0);
    bytes.writeUInt32LE(payload.length, HEADER_SIZE);
    payload.copy(bytes, HEADER_SIZE * 2);
    return { kind, content, payload, bytes };
  }

  encodeItemList(items: readonly EncodedItem[]): Uint8Array {
    const headerSize = HEADER_SIZE * (items.length + 1);
    const totalSize = items.reduce((size, item) => size + item.bytes.length, headerSize);
    const list = Buffer.alloc(totalSize);

    list.writeUInt32LE(totalSize, 0);
    let offset = headerSize;
    for (const [index, item] of items.entries()) {
      list.writeUInt32LE(offset, HEADER_SIZE * (index + 1));
      list.set(item.bytes, offset);
      offset += item.bytes.length;
    }
    return list;
  }

  decodeItemList(bytes: Uint8Array): DecodeResult<DecodedItem[]> {
    const list = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    if (list.length < HEADER_SIZE || list.readUInt32LE(0) !== list.length) {
      return fail(ErrorCode.DecodeInvalidItemList, { offset: 0 });
    }
    if (list.length === HEADER_SIZE) {
      return ok([]);
    }
    if (list.length < HEADER_SIZE * 2) {
      return fail(ErrorCode.DecodeInvalidItemList, { offset: HEADER_SIZE });
    }

    const firstOffset = list.readUInt32LE(HEADER_SIZE);
    if (firstOffset % HEADER_SIZE !== 0 || firstOffset < HEADER_SIZE * 2 || firstOffset > list.length) {
      return fail(ErrorCode.DecodeInvalidItemList, { offset: HEADER_SIZE });
    }

    const count = firstOffset / HEADER_SIZE - 1;
    const offsets: number[] = [];
    for (let index = 0; index < count; index++) {
      offsets.push(list.readUInt32LE(HEADER_SIZE * (index + 1)));
    }
    offsets.push(list.length);

    const items: DecodedItem[] = [];
    for (let index = 0; index < count; index++) {
      const start = offsets[index] ?? 0;
      const end = offsets[index + 1] ?? 0;
      if (start < firstOffset || end < start || end > list.length) {
        return fail(ErrorCode.DecodeInvalidItemList, { offset: HEADER_SIZE * (index + 1) });
      }
      const item = this.decodeItem(list.subarray(start, end), start);
      if (!item.ok) {
        return item;
      }
      items.push(item.value);
    }
    return ok(items);
  }

  private decodeItem(record: Buffer, offset: number): DecodeResult<DecodedItem> {
    if (record.length < HEADER_SIZE * 2) {
      return fail(ErrorCode.DecodeInvalidItemList, { offset });
    }
    const kind = kindForTag(record.readUInt32LE(0));
    const payloadLength = record.readUInt32LE(HEADER_SIZE);
    if (kind === undefined || payloadLength !== record.length - HEADER_SIZE * 2) {
      return fail(ErrorCode.DecodeInvalidItemList, { offset });
    }

    try {
      return ok({ kind, content: this.utf8.decode(record.subarray(HEADER_SIZE * 2)) });
    } catch {
      return fail(ErrorCode.DecodeBadUtf8Format, { offset });
    }
  }
}
