export const ARTIFACT_MAGIC = new Uint8Array([0x43, 0x41, 0x47, 0x47]); // "CAGG"
export const ARTIFACT_VERSION_BYTE = 0x01;

export enum OuterCodecId {
    NONE = 0,
    ZSTD = 1,
}

export type CodecName = 'zstd' | 'none';

// [magic (4)] [version (u8)] [codec (u8)] [reserved (u16)] [crc32 (u32 LE)] [payload_len (u32 LE)] [ipc_len (u32 LE)]
export const ARTIFACT_HEADER_SIZE = 4 + 1 + 1 + 2 + 4 + 4 + 4;

export interface ArtifactHeader {
    version: number;
    codec: OuterCodecId;
    crc32: number;
    payloadLength: number;
    /** Size of the Arrow IPC stream once the payload is decompressed */
    ipcLength: number;
}

export const ARTIFACT_EXTENSION = '.cagg';
export const MANIFEST_FILE = 'manifest.json';
export const CURRENT_POINTER_FILE = 'CURRENT';
export const VERSION_DIR_PREFIX = 'v-';
export const MANIFEST_FORMAT_VERSION = 1;
