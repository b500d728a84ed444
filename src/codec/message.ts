import {
  MessageType,
  MESSAGE_HEADER_SIZE,
  NEIGHB_HOLD_TIME,
  TOP_HOLD_TIME,
  MID_HOLD_TIME,
  HNA_HOLD_TIME,
  type MessageEnvelope,
  type OlsrMessage,
  type HelloMessage,
  type TcMessage,
  type MidMessage,
  type HnaMessage,
  type HelloBody,
  type TcBody,
  type MidBody,
  type HnaBody,
  type SkippedMessage,
  type DecodedMessage,
  type Ipv4Address,
} from './types.js';
import { ByteWriter, ByteReader } from './buffer.js';
import { CodecError } from './errors.js';
import { secondsToEmf, emfToSeconds } from './emf.js';
import {
  getBodySize,
  writeBody,
  readHelloBody,
  readTcBody,
  readMidBody,
  readHnaBody,
} from './body.js';
import { ipv4ToUint32, uint32ToIpv4 } from '../net/ipv4.js';

/**
 * Header fields accepted by the message factories.
 * Only the originator is required.
 */
export interface MessageInit {
  originator: Ipv4Address;
  vtime?: number;
  timeToLive?: number;
  hopCount?: number;
  sequenceNumber?: number;
}

function envelope(init: MessageInit, defaultVtime: number, defaultTtl: number): MessageEnvelope {
  return {
    vtime: init.vtime ?? defaultVtime,
    originator: init.originator,
    timeToLive: init.timeToLive ?? defaultTtl,
    hopCount: init.hopCount ?? 0,
    sequenceNumber: init.sequenceNumber ?? 0,
  };
}

/**
 * Create a HELLO message. HELLOs are never forwarded, so TTL defaults to 1.
 */
export function createHelloMessage(init: MessageInit, body: HelloBody): HelloMessage {
  return { ...envelope(init, NEIGHB_HOLD_TIME, 1), type: MessageType.HELLO, body };
}

export function createTcMessage(init: MessageInit, body: TcBody): TcMessage {
  return { ...envelope(init, TOP_HOLD_TIME, 255), type: MessageType.TC, body };
}

export function createMidMessage(init: MessageInit, body: MidBody): MidMessage {
  return { ...envelope(init, MID_HOLD_TIME, 255), type: MessageType.MID, body };
}

export function createHnaMessage(init: MessageInit, body: HnaBody): HnaMessage {
  return { ...envelope(init, HNA_HOLD_TIME, 255), type: MessageType.HNA, body };
}

export function isKnownMessageType(type: number): type is MessageType {
  return (
    type === MessageType.HELLO ||
    type === MessageType.TC ||
    type === MessageType.MID ||
    type === MessageType.HNA
  );
}

export function isSkippedMessage(message: DecodedMessage): message is SkippedMessage {
  return 'skipped' in message;
}

/**
 * Value of the message `size` field: header plus body
 */
export function getMessageSize(message: OlsrMessage): number {
  return MESSAGE_HEADER_SIZE + getBodySize(message);
}

/**
 * Write a message header and body
 *
 * Header layout (12 bytes, big-endian):
 * [0]      type            (1 byte)
 * [1]      vtime           (1 byte, EMF)
 * [2-3]    size            (2 bytes, header + body)
 * [4-7]    originator      (4 bytes)
 * [8]      timeToLive      (1 byte)
 * [9]      hopCount        (1 byte)
 * [10-11]  sequenceNumber  (2 bytes)
 */
export function writeMessage(writer: ByteWriter, message: OlsrMessage): void {
  writer.writeUint8(message.type, 'message type');
  writer.writeUint8(secondsToEmf(message.vtime));
  writer.writeUint16(getMessageSize(message), 'message size');
  writer.writeUint32(ipv4ToUint32(message.originator), 'originator');
  writer.writeUint8(message.timeToLive, 'timeToLive');
  writer.writeUint8(message.hopCount, 'hopCount');
  writer.writeUint16(message.sequenceNumber, 'message sequence number');
  writeBody(writer, message);
}

/**
 * Envelope of a message read off the wire, with its body bytes split off
 */
export interface MessageFrame extends MessageEnvelope {
  type: number;
  size: number;
  body: ByteReader;
}

/**
 * Read the fixed header and split off exactly `size - 12` body bytes.
 * The parent reader ends up at the start of the next message.
 */
export function readMessageFrame(reader: ByteReader): MessageFrame {
  const type = reader.readUint8();
  const vtime = emfToSeconds(reader.readUint8());
  const size = reader.readUint16();
  const originator = uint32ToIpv4(reader.readUint32());
  const timeToLive = reader.readUint8();
  const hopCount = reader.readUint8();
  const sequenceNumber = reader.readUint16();

  if (size < MESSAGE_HEADER_SIZE) {
    throw new CodecError(
      `Message size ${size} smaller than header (${MESSAGE_HEADER_SIZE})`,
      'SIZE_MISMATCH'
    );
  }

  const bodyBytes = size - MESSAGE_HEADER_SIZE;
  if (bodyBytes > reader.remaining) {
    throw new CodecError(
      `Message size ${size} exceeds available bytes (${reader.remaining + MESSAGE_HEADER_SIZE})`,
      'SIZE_MISMATCH'
    );
  }

  return {
    type,
    vtime,
    size,
    originator,
    timeToLive,
    hopCount,
    sequenceNumber,
    body: reader.take(bodyBytes),
  };
}

/**
 * Decode the body of a frame. Unknown types are reported as skipped.
 */
export function decodeMessageFrame(frame: MessageFrame): DecodedMessage {
  const { type, body, size, ...fields } = frame;

  let message: OlsrMessage;
  switch (type) {
    case MessageType.HELLO:
      message = { ...fields, type: MessageType.HELLO, body: readHelloBody(body) };
      break;
    case MessageType.TC:
      message = { ...fields, type: MessageType.TC, body: readTcBody(body) };
      break;
    case MessageType.MID:
      message = { ...fields, type: MessageType.MID, body: readMidBody(body) };
      break;
    case MessageType.HNA:
      message = { ...fields, type: MessageType.HNA, body: readHnaBody(body) };
      break;
    default:
      return { ...fields, type, size, skipped: true };
  }

  if (body.remaining !== 0) {
    throw new CodecError(
      `Message body left ${body.remaining} of ${size - MESSAGE_HEADER_SIZE} bytes unread`,
      'SIZE_MISMATCH'
    );
  }

  return message;
}

/**
 * Read one message from the reader
 */
export function readMessage(reader: ByteReader): DecodedMessage {
  return decodeMessageFrame(readMessageFrame(reader));
}

/**
 * Encode a single message to binary format
 */
export function encodeMessage(message: OlsrMessage): Uint8Array {
  const writer = new ByteWriter(getMessageSize(message));
  writeMessage(writer, message);
  return writer.finish();
}

/**
 * Decode binary data holding exactly one message
 */
export function decodeMessage(data: Uint8Array): DecodedMessage {
  const reader = new ByteReader(data);
  const message = readMessage(reader);

  if (reader.remaining !== 0) {
    throw new CodecError(
      `Trailing bytes after message: ${reader.remaining}`,
      'SIZE_MISMATCH'
    );
  }

  return message;
}

/**
 * Header update applied when a node retransmits a message:
 * TTL goes down by one and hop count up by one. Returns null when the
 * message must not travel further.
 */
export function prepareForwarding<T extends OlsrMessage>(message: T): T | null {
  if (message.timeToLive <= 1 || message.hopCount >= 0xff) {
    return null;
  }
  return {
    ...message,
    timeToLive: message.timeToLive - 1,
    hopCount: message.hopCount + 1,
  };
}
