import { ArtifactIntegrityError } from '../errors.js';
import {
    ARTIFACT_HEADER_SIZE,
    ARTIFACT_MAGIC,
    ARTIFACT_VERSION_BYTE,
    type ArtifactHeader,
    type CodecName,
} from './format.js';
import { calculateCRC32 } from './integrity.js';
import { DEFAULT_ZSTD_LEVEL, codecById, codecByName, type PayloadCodec } from './outer-codecs.js';

export interface FramedArtifact {
    bytes: Uint8Array;
    crc32: number;
}

interface ParsedHeader {
    header: ArtifactHeader;
    codec: PayloadCodec;
}

/**
 * Compresses an IPC payload and wraps it in the artifact frame.
 * The CRC covers the stored (compressed) payload.
 */
export async function frameArtifact(ipc: Uint8Array, codecName: CodecName, level: number = DEFAULT_ZSTD_LEVEL): Promise<FramedArtifact> {
    const codec = codecByName(codecName);
    const stored = await codec.compress(ipc, level);
    const crc32 = calculateCRC32(stored);

    const bytes = new Uint8Array(ARTIFACT_HEADER_SIZE + stored.length);
    const view = new DataView(bytes.buffer);
    bytes.set(ARTIFACT_MAGIC, 0);
    view.setUint8(4, ARTIFACT_VERSION_BYTE);
    view.setUint8(5, codec.id);
    view.setUint16(6, 0, true);
    view.setUint32(8, crc32, true);
    view.setUint32(12, stored.length, true);
    view.setUint32(16, ipc.length, true);
    bytes.set(stored, ARTIFACT_HEADER_SIZE);

    return { bytes, crc32 };
}

function parseHeader(bytes: Uint8Array, source: string): ParsedHeader {
    if (bytes.length < ARTIFACT_HEADER_SIZE) {
        throw new ArtifactIntegrityError(`${source}: truncated header (${bytes.length} bytes)`);
    }
    for (let i = 0; i < ARTIFACT_MAGIC.length; i++) {
        if (bytes[i] !== ARTIFACT_MAGIC[i]) {
            throw new ArtifactIntegrityError(`${source}: bad magic`);
        }
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const version = view.getUint8(4);
    if (version !== ARTIFACT_VERSION_BYTE) {
        throw new ArtifactIntegrityError(`${source}: unsupported version ${version}`);
    }

    const codecByte = view.getUint8(5);
    const codec = codecById(codecByte);
    if (!codec) {
        throw new ArtifactIntegrityError(`${source}: unknown codec ${codecByte}`);
    }

    const payloadLength = view.getUint32(12, true);
    if (ARTIFACT_HEADER_SIZE + payloadLength !== bytes.length) {
        throw new ArtifactIntegrityError(
            `${source}: payload length mismatch (header ${payloadLength}, file ${bytes.length - ARTIFACT_HEADER_SIZE})`
        );
    }

    return {
        header: {
            version,
            codec: codec.id,
            crc32: view.getUint32(8, true),
            payloadLength,
            ipcLength: view.getUint32(16, true),
        },
        codec,
    };
}

function checkCrc(bytes: Uint8Array, header: ArtifactHeader, source: string): void {
    const actual = calculateCRC32(bytes.subarray(ARTIFACT_HEADER_SIZE));
    if (actual !== header.crc32) {
        throw new ArtifactIntegrityError(`${source}: CRC mismatch (stored ${header.crc32}, computed ${actual})`);
    }
}

export function readArtifactHeader(bytes: Uint8Array, source: string): ArtifactHeader {
    return parseHeader(bytes, source).header;
}

/**
 * Checks the frame and CRC without decompressing.
 */
export function verifyArtifactBytes(bytes: Uint8Array, source: string): ArtifactHeader {
    const { header } = parseHeader(bytes, source);
    checkCrc(bytes, header, source);
    return header;
}

export async function unframeArtifact(bytes: Uint8Array, source: string): Promise<Uint8Array> {
    const { header, codec } = parseHeader(bytes, source);
    checkCrc(bytes, header, source);
    return codec.decompress(bytes.subarray(ARTIFACT_HEADER_SIZE), header.ipcLength, source);
}
