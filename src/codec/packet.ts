import {
  PACKET_HEADER_SIZE,
  MAX_PACKET_LENGTH,
  MAX_MESSAGES_PER_PACKET,
  type PacketHeader,
  type Packet,
  type OlsrMessage,
  type DecodedPacket,
  type DecodePacketOptions,
} from './types.js';
import { ByteWriter, ByteReader } from './buffer.js';
import { CodecError, isCodecError } from './errors.js';
import {
  getMessageSize,
  writeMessage,
  readMessageFrame,
  decodeMessageFrame,
  isSkippedMessage,
  type MessageFrame,
} from './message.js';

export function writePacketHeader(writer: ByteWriter, header: PacketHeader): void {
  writer.writeUint16(header.length, 'packet length');
  writer.writeUint16(header.sequenceNumber, 'packet sequence number');
}

export function readPacketHeader(reader: ByteReader): PacketHeader {
  const length = reader.readUint16();
  const sequenceNumber = reader.readUint16();
  return { length, sequenceNumber };
}

/**
 * Total packet length: header plus every message size
 */
export function getPacketLength(messages: OlsrMessage[]): number {
  return messages.reduce((acc, message) => acc + getMessageSize(message), PACKET_HEADER_SIZE);
}

/**
 * Encode a packet to binary format
 *
 * Binary layout (4 + messages bytes):
 * [0-1]  length          (2 bytes, big-endian, whole packet)
 * [2-3]  sequenceNumber  (2 bytes, big-endian)
 * [4+]   messages, in order
 */
export function encodePacket(packet: Packet): Uint8Array {
  const length = getPacketLength(packet.messages);
  if (length > MAX_PACKET_LENGTH) {
    throw new CodecError(
      `Packet too large: ${length} > ${MAX_PACKET_LENGTH}`,
      'INVALID_FIELD'
    );
  }

  const writer = new ByteWriter(length);
  writePacketHeader(writer, { length, sequenceNumber: packet.sequenceNumber });
  for (const message of packet.messages) {
    writeMessage(writer, message);
  }
  return writer.finish();
}

/**
 * Read one packet, leaving the reader just past its declared length
 */
export function readPacket(reader: ByteReader, options: DecodePacketOptions = {}): DecodedPacket {
  const strict = options.strict ?? true;
  const header = readPacketHeader(reader);

  if (header.length < PACKET_HEADER_SIZE) {
    throw new CodecError(
      `Packet length ${header.length} smaller than header (${PACKET_HEADER_SIZE})`,
      'SIZE_MISMATCH'
    );
  }

  const messageBytes = header.length - PACKET_HEADER_SIZE;
  if (messageBytes > reader.remaining) {
    throw new CodecError(
      `Packet length ${header.length} exceeds available bytes (${reader.remaining + PACKET_HEADER_SIZE})`,
      'BUFFER_UNDERRUN'
    );
  }

  // Messages are parsed inside the declared length only
  const body = reader.take(messageBytes);
  const result: DecodedPacket = { header, messages: [], skipped: [], rejected: [] };

  while (body.remaining > 0) {
    // An envelope that does not fit leaves no trustworthy way to resync
    const start = body.offset;
    let frame: MessageFrame;
    try {
      frame = readMessageFrame(body);
    } catch (error) {
      if (isCodecError(error, 'BUFFER_UNDERRUN')) {
        throw new CodecError(
          `Truncated message header at packet offset ${PACKET_HEADER_SIZE + start}`,
          'SIZE_MISMATCH'
        );
      }
      throw error;
    }

    try {
      const message = decodeMessageFrame(frame);
      if (isSkippedMessage(message)) {
        result.skipped.push(message);
      } else {
        result.messages.push(message);
      }
    } catch (error) {
      if (strict || !(error instanceof Error)) {
        throw error;
      }
      result.rejected.push({
        type: frame.type,
        originator: frame.originator,
        sequenceNumber: frame.sequenceNumber,
        size: frame.size,
        error,
      });
    }
  }

  return result;
}

/**
 * Decode binary data holding exactly one packet
 */
export function decodePacket(data: Uint8Array, options: DecodePacketOptions = {}): DecodedPacket {
  const reader = new ByteReader(data);
  const packet = readPacket(reader, options);

  if (reader.remaining !== 0) {
    throw new CodecError(
      `Trailing bytes after packet: ${reader.remaining}`,
      'SIZE_MISMATCH'
    );
  }

  return packet;
}

/**
 * Group messages into packets, preserving order. A packet closes when it
 * holds `maxMessages` messages or the next message would push its length
 * past 0xffff. Packet sequence numbers start at `firstSequenceNumber` and
 * wrap at 16 bits.
 */
export function splitIntoPackets(
  messages: OlsrMessage[],
  firstSequenceNumber: number,
  maxMessages: number = MAX_MESSAGES_PER_PACKET
): Packet[] {
  if (!Number.isInteger(maxMessages) || maxMessages < 1) {
    throw new Error(`Invalid message limit: ${maxMessages}`);
  }

  const packets: Packet[] = [];
  let current: OlsrMessage[] = [];
  let length = PACKET_HEADER_SIZE;

  const close = () => {
    packets.push({
      sequenceNumber: (firstSequenceNumber + packets.length) & 0xffff,
      messages: current,
    });
    current = [];
    length = PACKET_HEADER_SIZE;
  };

  for (const message of messages) {
    const size = getMessageSize(message);
    if (PACKET_HEADER_SIZE + size > MAX_PACKET_LENGTH) {
      throw new CodecError(`Message too large for a packet: ${size}`, 'INVALID_FIELD');
    }
    if (current.length >= maxMessages || length + size > MAX_PACKET_LENGTH) {
      close();
    }
    current.push(message);
    length += size;
  }

  if (current.length > 0) {
    close();
  }

  return packets;
}
