import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { ArtifactIntegrityError, CrimeAggError } from '../errors.js';
import { OuterCodecId, type CodecName } from './format.js';

export const DEFAULT_ZSTD_LEVEL = 3;

/**
 * Byte codec applied to an Arrow IPC payload before it is framed.
 *
 * `decompress` is given the IPC size recorded in the frame and refuses any
 * other result, so a damaged or hostile payload cannot expand past it.
 */
export interface PayloadCodec {
    readonly id: OuterCodecId;
    readonly name: CodecName;
    compress(ipc: Uint8Array, level: number): Promise<Uint8Array>;
    decompress(stored: Uint8Array, ipcLength: number, source: string): Promise<Uint8Array>;
}

function expectLength(ipc: Uint8Array, ipcLength: number, source: string): Uint8Array {
    if (ipc.length !== ipcLength) {
        throw new ArtifactIntegrityError(`${source}: payload decodes to ${ipc.length} bytes, frame records ${ipcLength}`);
    }
    return ipc;
}

let zstdModule: Promise<ZstdModule> | null = null;

function loadZstd(): Promise<ZstdModule> {
    if (!zstdModule) {
        zstdModule = new Promise<ZstdModule>((resolve) => ZstdCodec.run(resolve));
    }
    return zstdModule;
}

const identityCodec: PayloadCodec = {
    id: OuterCodecId.NONE,
    name: 'none',
    async compress(ipc) {
        return ipc;
    },
    async decompress(stored, ipcLength, source) {
        return expectLength(stored, ipcLength, source);
    },
};

const zstdCodec: PayloadCodec = {
    id: OuterCodecId.ZSTD,
    name: 'zstd',
    async compress(ipc, level) {
        const { Simple } = await loadZstd();
        const packed = new Simple().compress(ipc, level);
        if (!packed) throw new CrimeAggError(`zstd could not compress ${ipc.length} bytes at level ${level}`);
        return packed;
    },
    async decompress(stored, ipcLength, source) {
        // The frame has already passed its CRC, so a failure here means the
        // writer produced something zstd cannot read.
        const { Simple } = await loadZstd();
        const ipc = new Simple().decompress(stored);
        if (!ipc) throw new ArtifactIntegrityError(`${source}: zstd payload does not decode`);
        return expectLength(ipc, ipcLength, source);
    },
};

const BY_NAME: Record<CodecName, PayloadCodec> = {
    none: identityCodec,
    zstd: zstdCodec,
};

const BY_ID: ReadonlyMap<number, PayloadCodec> = new Map(
    Object.values(BY_NAME).map((codec): [number, PayloadCodec] => [codec.id, codec])
);

export function codecByName(name: CodecName): PayloadCodec {
    return BY_NAME[name];
}

/** Codec for a frame's codec byte, or undefined when the byte is unknown. */
export function codecById(id: number): PayloadCodec | undefined {
    return BY_ID.get(id);
}
