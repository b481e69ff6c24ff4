import { randomBytes } from 'node:crypto';

/** Largest payload accepted at all (128 chunks of MAX_PAYLOAD_SIZE). */
export const MAX_SIZE = 1_047_040;
/** Largest payload sent as one plain datagram. */
export const MAX_PACKET_SIZE = 8192;
export const CHUNK_HEADER_SIZE = 12;
export const MAX_PAYLOAD_SIZE = MAX_PACKET_SIZE - CHUNK_HEADER_SIZE;
export const CHUNK_MAGIC = [0x1e, 0x0f] as const;

export interface ChunkFrame {
  messageId: Buffer;
  sequence: number;
  total: number;
  payload: Buffer;
}

export function chunkCount(length: number): number {
  return Math.ceil(length / MAX_PAYLOAD_SIZE);
}

export function messageId(): Buffer {
  return randomBytes(8);
}

export function frameChunk(payload: Buffer, id: Buffer, sequence: number, total: number): Buffer {
  const header = Buffer.allocUnsafe(CHUNK_HEADER_SIZE);
  header[0] = CHUNK_MAGIC[0];
  header[1] = CHUNK_MAGIC[1];
  id.copy(header, 2, 0, 8);
  header[10] = sequence;
  header[11] = total;
  return Buffer.concat([header, payload]);
}

/** Split a payload into the GELF chunk datagrams for one message, sequence ascending. */
export function splitIntoChunks(data: Buffer, id: Buffer = messageId()): Buffer[] {
  const total = chunkCount(data.length);
  const frames: Buffer[] = [];
  for (let seq = 0; seq < total; seq++) {
    const start = seq * MAX_PAYLOAD_SIZE;
    frames.push(frameChunk(data.subarray(start, start + MAX_PAYLOAD_SIZE), id, seq, total));
  }
  return frames;
}

/** Read a chunk header back; null for a datagram without the chunk magic. */
export function parseChunk(datagram: Buffer): ChunkFrame | null {
  if (datagram.length < CHUNK_HEADER_SIZE) return null;
  if (datagram[0] !== CHUNK_MAGIC[0] || datagram[1] !== CHUNK_MAGIC[1]) return null;
  return {
    messageId: datagram.subarray(2, 10),
    sequence: datagram[10],
    total: datagram[11],
    payload: datagram.subarray(CHUNK_HEADER_SIZE)
  };
}
