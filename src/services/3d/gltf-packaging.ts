/**
 * glTF packaging
 * Decides how the binary buffer travels with the document
 */

import { GltfDocument } from '../../types/gltf.types';
import { GLTF } from '../../utils/constants';
import { SerializationError } from '../../utils/errors';

const withBufferUri = (gltf: GltfDocument, uri: string): GltfDocument => {
  if (gltf.buffers.length !== 1) {
    throw new SerializationError(`Expected exactly one buffer, found ${gltf.buffers.length}`);
  }
  return {
    ...gltf,
    buffers: [{ ...gltf.buffers[0], uri }]
  };
};

/**
 * Self-contained .gltf: the buffer is inlined as a base64 data URI.
 */
export const embedBufferAsDataUri = (gltf: GltfDocument, buffer: Buffer): GltfDocument => {
  if (gltf.buffers[0]?.byteLength !== buffer.byteLength) {
    throw new SerializationError('Declared buffer length does not match the binary data', {
      declared: gltf.buffers[0]?.byteLength,
      actual: buffer.byteLength
    });
  }
  return withBufferUri(gltf, `${GLTF.DATA_URI_PREFIX}${buffer.toString('base64')}`);
};

/**
 * .gltf + .bin pair: the buffer is referenced by a relative file name.
 */
export const referenceExternalBuffer = (gltf: GltfDocument, binFileName: string): GltfDocument =>
  withBufferUri(gltf, binFileName);

/**
 * Read back an embedded buffer.
 */
export const decodeDataUri = (uri: string): Buffer => {
  if (!uri.startsWith(GLTF.DATA_URI_PREFIX)) {
    throw new SerializationError('Buffer URI is not a base64 octet-stream data URI');
  }
  return Buffer.from(uri.slice(GLTF.DATA_URI_PREFIX.length), 'base64');
};

const padTo4 = (length: number): number => (4 - (length % 4)) % 4;

/**
 * Binary glTF container: 12-byte header, JSON chunk (space padded),
 * BIN chunk (zero padded).
 */
export const packGlb = (gltf: GltfDocument, buffer: Buffer): Buffer => {
  // Buffer 0 of a GLB is the BIN chunk and carries no uri
  const json = Buffer.from(JSON.stringify({ ...gltf, buffers: [{ byteLength: buffer.byteLength }] }), 'utf8');

  const jsonPadding = padTo4(json.byteLength);
  const binPadding = padTo4(buffer.byteLength);
  const jsonChunkLength = json.byteLength + jsonPadding;
  const binChunkLength = buffer.byteLength + binPadding;
  const totalLength = 12 + 8 + jsonChunkLength + 8 + binChunkLength;

  if (totalLength > GLTF.MAX_UINT32) {
    throw new SerializationError(`GLB size ${totalLength} exceeds the uint32 range`, { totalLength });
  }

  const glb = Buffer.alloc(totalLength);
  let offset = 0;

  // Header
  offset = glb.writeUInt32LE(GLTF.GLB_MAGIC, offset);
  offset = glb.writeUInt32LE(GLTF.GLB_VERSION, offset);
  offset = glb.writeUInt32LE(totalLength, offset);

  // JSON chunk
  offset = glb.writeUInt32LE(jsonChunkLength, offset);
  offset = glb.writeUInt32LE(GLTF.CHUNK_JSON, offset);
  offset += json.copy(glb, offset);
  glb.fill(0x20, offset, offset + jsonPadding);
  offset += jsonPadding;

  // BIN chunk
  offset = glb.writeUInt32LE(binChunkLength, offset);
  offset = glb.writeUInt32LE(GLTF.CHUNK_BIN, offset);
  buffer.copy(glb, offset);

  return glb;
};
