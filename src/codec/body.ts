import {
  MessageType,
  ADDRESS_SIZE,
  LINK_BLOCK_HEADER_SIZE,
  type LinkType,
  type NeighborType,
  type OlsrMessage,
  type HelloBody,
  type TcBody,
  type MidBody,
  type HnaBody,
  type LinkBlock,
  type HnaAssociation,
  type Ipv4Address,
} from './types.js';
import { ByteWriter, ByteReader } from './buffer.js';
import { CodecError } from './errors.js';
import { secondsToEmf, emfToSeconds } from './emf.js';
import { ipv4ToUint32, uint32ToIpv4 } from '../net/ipv4.js';

const HELLO_PREFIX_SIZE = 4;  // reserved(2) + htime(1) + willingness(1)
const TC_PREFIX_SIZE = 4;     // ansn(2) + reserved(2)
const ASSOCIATION_SIZE = 8;   // address(4) + mask(4)

/**
 * Pack a link type and neighbor type into a link code
 */
export function encodeLinkCode(linkType: LinkType, neighborType: NeighborType): number {
  return ((neighborType & 0x03) << 2) | (linkType & 0x03);
}

/**
 * Split a link code into its link type and neighbor type.
 * Bits above the neighbor type are ignored.
 */
export function decodeLinkCode(linkCode: number): { linkType: LinkType; neighborType: NeighborType } {
  return {
    linkType: linkCode & 0x03,
    neighborType: (linkCode >> 2) & 0x03,
  };
}

export function getLinkBlockSize(block: LinkBlock): number {
  return LINK_BLOCK_HEADER_SIZE + ADDRESS_SIZE * block.neighborAddresses.length;
}

/**
 * Serialized size of a message body
 */
export function getBodySize(message: OlsrMessage): number {
  switch (message.type) {
    case MessageType.HELLO:
      return message.body.linkBlocks.reduce(
        (acc, block) => acc + getLinkBlockSize(block),
        HELLO_PREFIX_SIZE
      );
    case MessageType.TC:
      return TC_PREFIX_SIZE + ADDRESS_SIZE * message.body.neighborAddresses.length;
    case MessageType.MID:
      return ADDRESS_SIZE * message.body.interfaceAddresses.length;
    case MessageType.HNA:
      return ASSOCIATION_SIZE * message.body.associations.length;
  }
}

/**
 * Write the active body of a message
 */
export function writeBody(writer: ByteWriter, message: OlsrMessage): void {
  switch (message.type) {
    case MessageType.HELLO:
      writeHelloBody(writer, message.body);
      return;
    case MessageType.TC:
      writeTcBody(writer, message.body);
      return;
    case MessageType.MID:
      writeMidBody(writer, message.body);
      return;
    case MessageType.HNA:
      writeHnaBody(writer, message.body);
      return;
  }
}

function writeAddress(writer: ByteWriter, address: Ipv4Address): void {
  writer.writeUint32(ipv4ToUint32(address), 'address');
}

function readAddress(reader: ByteReader): Ipv4Address {
  return uint32ToIpv4(reader.readUint32());
}

/**
 * Derive an element count from a byte budget, rejecting leftovers
 */
function countElements(bytes: number, elementSize: number, what: string): number {
  if (bytes % elementSize !== 0) {
    throw new CodecError(
      `${what}: ${bytes} bytes is not a multiple of ${elementSize}`,
      'SIZE_MISMATCH'
    );
  }
  return bytes / elementSize;
}

function readAddressList(reader: ByteReader, what: string): Ipv4Address[] {
  const count = countElements(reader.remaining, ADDRESS_SIZE, what);
  const addresses: Ipv4Address[] = [];
  for (let i = 0; i < count; i++) {
    addresses.push(readAddress(reader));
  }
  return addresses;
}

// ─── HELLO ──────────────────────────────────────────────────────────

/**
 * Layout:
 * [0-1]  reserved     (2 bytes, zero)
 * [2]    htime        (1 byte, EMF)
 * [3]    willingness  (1 byte)
 * [4+]   link blocks: linkCode(1) reserved(1) blockSize(2) address(4)*
 */
export function writeHelloBody(writer: ByteWriter, body: HelloBody): void {
  writer.writeUint16(0);
  writer.writeUint8(secondsToEmf(body.htime));
  writer.writeUint8(body.willingness, 'willingness');

  for (const block of body.linkBlocks) {
    writer.writeUint8(block.linkCode, 'linkCode');
    writer.writeUint8(0);
    writer.writeUint16(getLinkBlockSize(block), 'link block size');
    for (const address of block.neighborAddresses) {
      writeAddress(writer, address);
    }
  }
}

export function readHelloBody(reader: ByteReader): HelloBody {
  if (reader.remaining < HELLO_PREFIX_SIZE) {
    throw new CodecError(
      `HELLO body too short: ${reader.remaining} < ${HELLO_PREFIX_SIZE}`,
      'SIZE_MISMATCH'
    );
  }

  reader.skip(2);
  const htime = emfToSeconds(reader.readUint8());
  const willingness = reader.readUint8();

  const linkBlocks: LinkBlock[] = [];
  while (reader.remaining > 0) {
    if (reader.remaining < LINK_BLOCK_HEADER_SIZE) {
      throw new CodecError(
        `Truncated link block header: ${reader.remaining} bytes left`,
        'SIZE_MISMATCH'
      );
    }

    const linkCode = reader.readUint8();
    reader.skip(1);
    const blockSize = reader.readUint16();

    if (blockSize < LINK_BLOCK_HEADER_SIZE) {
      throw new CodecError(`Invalid link block size: ${blockSize}`, 'SIZE_MISMATCH');
    }

    const addressBytes = blockSize - LINK_BLOCK_HEADER_SIZE;
    if (addressBytes > reader.remaining) {
      throw new CodecError(
        `Link block overruns body: ${addressBytes} > ${reader.remaining}`,
        'SIZE_MISMATCH'
      );
    }

    const neighborAddresses = readAddressList(reader.take(addressBytes), 'Link block');
    linkBlocks.push({ linkCode, neighborAddresses });
  }

  return { htime, willingness, linkBlocks };
}

// ─── TC ─────────────────────────────────────────────────────────────

/**
 * Layout:
 * [0-1]  ansn      (2 bytes)
 * [2-3]  reserved  (2 bytes, zero)
 * [4+]   advertised neighbor addresses (4 bytes each)
 */
export function writeTcBody(writer: ByteWriter, body: TcBody): void {
  writer.writeUint16(body.ansn, 'ansn');
  writer.writeUint16(0);
  for (const address of body.neighborAddresses) {
    writeAddress(writer, address);
  }
}

export function readTcBody(reader: ByteReader): TcBody {
  if (reader.remaining < TC_PREFIX_SIZE) {
    throw new CodecError(
      `TC body too short: ${reader.remaining} < ${TC_PREFIX_SIZE}`,
      'SIZE_MISMATCH'
    );
  }

  const ansn = reader.readUint16();
  reader.skip(2);
  const neighborAddresses = readAddressList(reader, 'TC body');

  return { ansn, neighborAddresses };
}

// ─── MID ────────────────────────────────────────────────────────────

export function writeMidBody(writer: ByteWriter, body: MidBody): void {
  for (const address of body.interfaceAddresses) {
    writeAddress(writer, address);
  }
}

export function readMidBody(reader: ByteReader): MidBody {
  return { interfaceAddresses: readAddressList(reader, 'MID body') };
}

// ─── HNA ────────────────────────────────────────────────────────────

export function writeHnaBody(writer: ByteWriter, body: HnaBody): void {
  for (const association of body.associations) {
    writeAddress(writer, association.address);
    writeAddress(writer, association.mask);
  }
}

export function readHnaBody(reader: ByteReader): HnaBody {
  const count = countElements(reader.remaining, ASSOCIATION_SIZE, 'HNA body');
  const associations: HnaAssociation[] = [];
  for (let i = 0; i < count; i++) {
    const address = readAddress(reader);
    const mask = readAddress(reader);
    associations.push({ address, mask });
  }
  return { associations };
}
