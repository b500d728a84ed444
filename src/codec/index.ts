export {
  MessageType,
  Willingness,
  LinkType,
  NeighborType,
  PACKET_HEADER_SIZE,
  MESSAGE_HEADER_SIZE,
  LINK_BLOCK_HEADER_SIZE,
  ADDRESS_SIZE,
  MAX_PACKET_LENGTH,
  MAX_MESSAGES_PER_PACKET,
  HELLO_INTERVAL,
  TC_INTERVAL,
  MID_INTERVAL,
  HNA_INTERVAL,
  NEIGHB_HOLD_TIME,
  TOP_HOLD_TIME,
  MID_HOLD_TIME,
  HNA_HOLD_TIME,
  type Ipv4Address,
  type LinkBlock,
  type HelloBody,
  type TcBody,
  type MidBody,
  type HnaAssociation,
  type HnaBody,
  type MessageEnvelope,
  type HelloMessage,
  type TcMessage,
  type MidMessage,
  type HnaMessage,
  type OlsrMessage,
  type SkippedMessage,
  type DecodedMessage,
  type PacketHeader,
  type Packet,
  type RejectedMessage,
  type DecodedPacket,
  type DecodePacketOptions,
} from './types.js';

export { CodecError, isCodecError, type CodecErrorCode } from './errors.js';

export { ByteWriter, ByteReader } from './buffer.js';

export {
  EMF_SCALING_CONSTANT,
  EMF_MAX_SECONDS,
  secondsToEmf,
  emfToSeconds,
  quantizeSeconds,
} from './emf.js';

export {
  encodeLinkCode,
  decodeLinkCode,
  getLinkBlockSize,
  getBodySize,
} from './body.js';

export {
  createHelloMessage,
  createTcMessage,
  createMidMessage,
  createHnaMessage,
  isKnownMessageType,
  isSkippedMessage,
  getMessageSize,
  writeMessage,
  readMessage,
  readMessageFrame,
  decodeMessageFrame,
  encodeMessage,
  decodeMessage,
  prepareForwarding,
  type MessageInit,
  type MessageFrame,
} from './message.js';

export {
  writePacketHeader,
  readPacketHeader,
  getPacketLength,
  encodePacket,
  readPacket,
  decodePacket,
  splitIntoPackets,
} from './packet.js';
