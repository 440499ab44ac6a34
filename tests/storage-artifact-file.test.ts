import { ArtifactIntegrityError } from '../src/errors.js';
import { frameArtifact, readArtifactHeader, unframeArtifact, verifyArtifactBytes } from '../src/storage/artifact-file.js';
import { ARTIFACT_HEADER_SIZE, OuterCodecId } from '../src/storage/format.js';
import { calculateCRC32 } from '../src/storage/integrity.js';

describe('calculateCRC32', () => {
    it('matches the standard check value', () => {
        expect(calculateCRC32(new TextEncoder().encode('123456789'))).toBe(0xCBF43926);
    });

    it('is zero for empty input', () => {
        expect(calculateCRC32(new Uint8Array(0))).toBe(0);
    });
});

describe('artifact frame', () => {
    const payload = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]);

    it('writes the header fields', async () => {
        const { bytes, crc32 } = await frameArtifact(payload, 'none');

        expect(bytes.length).toBe(ARTIFACT_HEADER_SIZE + payload.length);
        expect(Array.from(bytes.subarray(0, 4))).toEqual([0x43, 0x41, 0x47, 0x47]);
        expect(crc32).toBe(calculateCRC32(payload));
        expect(readArtifactHeader(bytes, 'test')).toEqual({
            version: 1,
            codec: OuterCodecId.NONE,
            crc32,
            payloadLength: payload.length,
            ipcLength: payload.length,
        });
    });

    it('restores the payload through zstd', async () => {
        const large = new Uint8Array(4096).map((_, i) => i % 7);
        const { bytes } = await frameArtifact(large, 'zstd');

        expect(bytes.length).toBeLessThan(large.length);
        expect(Array.from(await unframeArtifact(bytes, 'test'))).toEqual(Array.from(large));
    });

    it('refuses a payload that decodes to another size than recorded', async () => {
        const { bytes } = await frameArtifact(payload, 'none');
        new DataView(bytes.buffer).setUint32(16, 4, true);

        await expect(unframeArtifact(bytes, 'f.cagg')).rejects.toThrow(
            new ArtifactIntegrityError('f.cagg: payload decodes to 8 bytes, frame records 4')
        );
    });

    it('bounds zstd output by the recorded size', async () => {
        const large = new Uint8Array(4096).map((_, i) => i % 7);
        const { bytes } = await frameArtifact(large, 'zstd');
        new DataView(bytes.buffer).setUint32(16, 1024, true);

        await expect(unframeArtifact(bytes, 'f.cagg')).rejects.toThrow(
            'f.cagg: payload decodes to 4096 bytes, frame records 1024'
        );
    });

    it('detects a flipped payload byte', async () => {
        const { bytes } = await frameArtifact(payload, 'none');
        bytes[ARTIFACT_HEADER_SIZE + 3] ^= 0xff;

        expect(() => verifyArtifactBytes(bytes, 'f.cagg')).toThrow(ArtifactIntegrityError);
        expect(() => verifyArtifactBytes(bytes, 'f.cagg')).toThrow(/^f\.cagg: CRC mismatch/);
    });

    it('rejects a truncated file', async () => {
        const { bytes } = await frameArtifact(payload, 'none');
        expect(() => readArtifactHeader(bytes.subarray(0, bytes.length - 1), 'f.cagg')).toThrow(
            'f.cagg: payload length mismatch (header 8, file 7)'
        );
        expect(() => readArtifactHeader(bytes.subarray(0, 10), 'f.cagg')).toThrow('f.cagg: truncated header (10 bytes)');
    });

    it('rejects foreign magic, versions and codecs', async () => {
        const framed = async () => (await frameArtifact(payload, 'none')).bytes;

        const badMagic = await framed();
        badMagic[0] = 0x58;
        expect(() => readArtifactHeader(badMagic, 'f')).toThrow('f: bad magic');

        const badVersion = await framed();
        badVersion[4] = 2;
        expect(() => readArtifactHeader(badVersion, 'f')).toThrow('f: unsupported version 2');

        const badCodec = await framed();
        badCodec[5] = 9;
        expect(() => readArtifactHeader(badCodec, 'f')).toThrow('f: unknown codec 9');
    });
});
