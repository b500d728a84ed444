/**
 * Message types (RFC 3626 section 18.4)
 */
export enum MessageType {
  HELLO = 1,  // Link sensing / neighbor discovery
  TC = 2,     // Topology control
  MID = 3,    // Multiple interface declaration
  HNA = 4,    // Host and network association
}

/**
 * Willingness of a node to carry traffic for others
 */
export enum Willingness {
  NEVER = 0,
  LOW = 1,
  DEFAULT = 3,
  HIGH = 6,
  ALWAYS = 7,
}

/**
 * Link type, low two bits of a link code
 */
export enum LinkType {
  UNSPEC = 0,
  ASYM = 1,
  SYM = 2,
  LOST = 3,
}

/**
 * Neighbor type, bits 2-3 of a link code
 */
export enum NeighborType {
  NOT_NEIGH = 0,
  SYM_NEIGH = 1,
  MPR_NEIGH = 2,
}

/**
 * Packet header size in bytes: length(2) + sequenceNumber(2)
 */
export const PACKET_HEADER_SIZE = 4;

/**
 * Message header size in bytes:
 * type(1) + vtime(1) + size(2) + originator(4) + ttl(1) + hopCount(1) + seq(2)
 */
export const MESSAGE_HEADER_SIZE = 12;

/**
 * Link block header size in bytes: linkCode(1) + reserved(1) + blockSize(2)
 */
export const LINK_BLOCK_HEADER_SIZE = 4;

export const ADDRESS_SIZE = 4;

/**
 * Largest value a 16-bit length field can carry
 */
export const MAX_PACKET_LENGTH = 0xffff;

/**
 * Maximum number of messages bundled into one packet
 */
export const MAX_MESSAGES_PER_PACKET = 64;

// Emission intervals and hold times, in seconds
export const HELLO_INTERVAL = 2;
export const TC_INTERVAL = 5;
export const MID_INTERVAL = TC_INTERVAL;
export const HNA_INTERVAL = TC_INTERVAL;
export const NEIGHB_HOLD_TIME = 3 * HELLO_INTERVAL;
export const TOP_HOLD_TIME = 3 * TC_INTERVAL;
export const MID_HOLD_TIME = 3 * MID_INTERVAL;
export const HNA_HOLD_TIME = 3 * HNA_INTERVAL;

/**
 * Dotted-quad IPv4 address, e.g. "10.0.0.1"
 */
export type Ipv4Address = string;

/**
 * Group of neighbor interface addresses sharing one link code
 */
export interface LinkBlock {
  linkCode: number;               // neighborType << 2 | linkType (1 byte)
  neighborAddresses: Ipv4Address[];
}

export interface HelloBody {
  htime: number;                  // Hello emission interval, seconds (EMF on the wire)
  willingness: number;            // Nominally 0-7, carried as a full byte
  linkBlocks: LinkBlock[];
}

export interface TcBody {
  ansn: number;                   // Advertised neighbor sequence number (2 bytes)
  neighborAddresses: Ipv4Address[];
}

export interface MidBody {
  interfaceAddresses: Ipv4Address[];
}

export interface HnaAssociation {
  address: Ipv4Address;
  mask: Ipv4Address;              // Netmask in dotted-quad form
}

export interface HnaBody {
  associations: HnaAssociation[];
}

/**
 * Fields shared by every message header
 */
export interface MessageEnvelope {
  vtime: number;                  // Validity time, seconds (EMF on the wire)
  originator: Ipv4Address;        // Main address of the originating node
  timeToLive: number;             // 1 byte
  hopCount: number;               // 1 byte
  sequenceNumber: number;         // Message sequence number (2 bytes)
}

export interface HelloMessage extends MessageEnvelope {
  readonly type: MessageType.HELLO;
  readonly body: HelloBody;
}

export interface TcMessage extends MessageEnvelope {
  readonly type: MessageType.TC;
  readonly body: TcBody;
}

export interface MidMessage extends MessageEnvelope {
  readonly type: MessageType.MID;
  readonly body: MidBody;
}

export interface HnaMessage extends MessageEnvelope {
  readonly type: MessageType.HNA;
  readonly body: HnaBody;
}

/**
 * A message with exactly one active body, discriminated by `type`
 */
export type OlsrMessage = HelloMessage | TcMessage | MidMessage | HnaMessage;

/**
 * Header of a message whose type tag is not understood.
 * The body bytes were skipped without being interpreted.
 */
export interface SkippedMessage extends MessageEnvelope {
  readonly type: number;
  readonly skipped: true;
  readonly size: number;
}

export type DecodedMessage = OlsrMessage | SkippedMessage;

/**
 * Packet header
 */
export interface PacketHeader {
  length: number;                 // Total bytes including this header (2 bytes)
  sequenceNumber: number;         // Packet sequence number (2 bytes)
}

/**
 * Packet ready for encoding. The length is computed from the messages.
 */
export interface Packet {
  sequenceNumber: number;
  messages: OlsrMessage[];
}

/**
 * Message whose envelope was read but whose body failed to decode
 */
export interface RejectedMessage {
  type: number;
  originator: Ipv4Address;
  sequenceNumber: number;
  size: number;
  error: Error;
}

export interface DecodedPacket {
  header: PacketHeader;
  messages: OlsrMessage[];
  skipped: SkippedMessage[];
  rejected: RejectedMessage[];
}

export interface DecodePacketOptions {
  /**
   * Abort the whole packet when a message body fails to decode (default true).
   * When false the failure is collected in `rejected` and parsing resumes at
   * the next message.
   */
  strict?: boolean;
}
