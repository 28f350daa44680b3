import { promises as fsp } from "fs";
import sharp from "sharp";
import type { Metadata } from "sharp";
import type { ConversionRequest, ConversionResult, ImageConverter } from "./converter.js";
import { classifyStream, sourceExists } from "./probe.js";
import type { CodecProbe, StreamDescriptor } from "./probe.js";
import type { CodecClassification } from "./types.js";

export const LIMIT_INPUT_PIXELS = 100_000_000;

export const APNG_UNSUPPORTED_REASON =
  "animated PNG is not supported by the sharp engine, use --engine magick";
export const BMP_UNSUPPORTED_REASON = "BMP is not supported by the sharp engine, use --engine magick";

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const CHUNK_HEADER_BYTES = 8;
const CHUNK_CRC_BYTES = 4;

export type ContainerHint = "apng" | "bmp" | null;

/**
 * Reads just enough of the file to spot containers libvips decodes wrongly or
 * not at all: BMP by its magic, APNG by an `acTL` chunk ahead of the first
 * `IDAT`.
 */
export async function sniffContainer(filePath: string): Promise<ContainerHint> {
  const handle = await fsp.open(filePath, "r");
  try {
    const header = Buffer.alloc(CHUNK_HEADER_BYTES);
    const { bytesRead } = await handle.read(header, 0, PNG_SIGNATURE.length, 0);
    if (bytesRead >= 2 && header.toString("latin1", 0, 2) === "BM") return "bmp";
    if (bytesRead < PNG_SIGNATURE.length || !header.equals(PNG_SIGNATURE)) return null;

    let offset = PNG_SIGNATURE.length;
    for (;;) {
      const chunk = await handle.read(header, 0, CHUNK_HEADER_BYTES, offset);
      if (chunk.bytesRead < CHUNK_HEADER_BYTES) return null;
      const type = header.toString("latin1", 4, 8);
      if (type === "acTL") return "apng";
      if (type === "IDAT" || type === "IEND") return null;
      offset += CHUNK_HEADER_BYTES + header.readUInt32BE(0) + CHUNK_CRC_BYTES;
    }
  } finally {
    await handle.close();
  }
}

const FORMAT_CODECS: Record<string, string> = {
  jpeg: "mjpeg",
  jpg: "mjpeg",
  png: "png",
  webp: "webp",
  gif: "gif",
  tiff: "tiff",
};

/** Maps sharp metadata onto the codec tags the ffprobe probe reports. */
export function describeMetadata(metadata: Metadata): StreamDescriptor | null {
  const format = metadata.format;
  if (format === undefined) return null;

  let codec: string = FORMAT_CODECS[format] ?? format;
  if (format === "heif") {
    codec = metadata.compression === "av1" ? "av1" : "hevc";
  }
  return { codec, frameCount: metadata.pages ?? 1 };
}

export class SharpCodecProbe implements CodecProbe {
  async probe(filePath: string): Promise<CodecClassification> {
    try {
      if (!(await sourceExists(filePath))) {
        return { kind: "probe-failed", reason: "not found" };
      }
      // libvips reads an APNG as its first frame only.
      const hint = await sniffContainer(filePath);
      if (hint === "apng") return { kind: "animated-apng", codec: "apng" };
      if (hint === "bmp") return { kind: "probe-failed", reason: BMP_UNSUPPORTED_REASON };

      const metadata = await sharp(filePath, {
        animated: true,
        limitInputPixels: LIMIT_INPUT_PIXELS,
      }).metadata();
      return classifyStream(describeMetadata(metadata));
    } catch (err) {
      const reason = err instanceof Error ? err.message : "unknown error";
      return { kind: "probe-failed", reason };
    }
  }
}

export class SharpConverter implements ImageConverter {
  async convert(request: ConversionRequest): Promise<ConversionResult> {
    if (request.signal?.aborted) {
      return { ok: false, reason: "cancelled" };
    }
    if (request.animatedApng) {
      return { ok: false, reason: APNG_UNSUPPORTED_REASON };
    }
    try {
      await sharp(request.sourcePath, {
        failOn: "error",
        limitInputPixels: LIMIT_INPUT_PIXELS,
      })
        .rotate()
        .webp({
          quality: request.quality,
          lossless: request.lossless,
          alphaQuality: 100,
          smartSubsample: true,
          effort: 6,
        })
        .toFile(request.destinationPath);
      return { ok: true };
    } catch (err) {
      const reason = err instanceof Error ? err.message : "unknown error";
      return { ok: false, reason };
    }
  }
}
