/**
 * Media toolkit: sniffing, image transcoding, thumbnails, video first frames
 * and round avatars.
 *
 * Images go through sharp. Video frames come from an external ffmpeg binary
 * (`ffmpeg_path` in config, default "ffmpeg" on PATH). The attachment
 * pipeline takes the toolkit as an interface so tests can substitute a fake.
 */

import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { promisify } from "node:util";
import { fileTypeFromBuffer } from "file-type";
import sharp from "sharp";

const execFileAsync = promisify(execFile);

export type MediaKind = "video" | "image" | "audio" | "file";

export interface Classification {
  kind: MediaKind;
  mimetype: string;
}

export interface EncodedImage {
  data: Buffer;
  width: number;
  /** Height of one frame for animated output. */
  height: number;
}

export interface MediaToolkit {
  /** Sniff the bytes; fall back to the declared type when sniffing finds nothing. */
  classify(data: Buffer, declaredType: string): Promise<Classification>;
  /** Re-encode as WebP (quality 80, maximum effort). Animated input stays animated. */
  toWebp(data: Buffer): Promise<EncodedImage>;
  /** Scale to fit inside maxWidth x maxHeight, encoded as WebP. Keeps every frame. */
  thumbnail(data: Buffer, maxWidth: number, maxHeight: number): Promise<EncodedImage>;
  /** Extract the first video frame from a file on disk, as WebP. */
  firstFrame(inputPath: string, outputPath: string): Promise<EncodedImage>;
  /** Circular PNG crop of an avatar at `size` x `size`. */
  roundAvatar(data: Buffer, size: number): Promise<Buffer>;
}

export const WEBP_QUALITY = 80;
/** sharp's slowest, smallest WebP setting. */
export const WEBP_EFFORT = 6;

export function kindForMime(mimetype: string): MediaKind {
  if (mimetype.startsWith("video/")) return "video";
  if (mimetype.startsWith("image/")) return "image";
  if (mimetype.startsWith("audio/")) return "audio";
  return "file";
}

export function createMediaToolkit(options: { ffmpegPath?: string } = {}): MediaToolkit {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";

  const encode = async (pipeline: sharp.Sharp): Promise<EncodedImage> => {
    const { data, info } = await pipeline
      .webp({ quality: WEBP_QUALITY, effort: WEBP_EFFORT })
      .toBuffer({ resolveWithObject: true });
    // Frames of animated output are stacked vertically in `info.height`.
    const { pageHeight } = await sharp(data).metadata();
    return { data, width: info.width, height: pageHeight ?? info.height };
  };

  const load = (data: Buffer): sharp.Sharp => sharp(data, { animated: true });

  return {
    async classify(data, declaredType) {
      const sniffed = await fileTypeFromBuffer(data);
      const mimetype = sniffed?.mime ?? (declaredType || "application/octet-stream");
      return { kind: kindForMime(mimetype), mimetype };
    },

    toWebp(data) {
      return encode(load(data));
    },

    thumbnail(data, maxWidth, maxHeight) {
      return encode(load(data).resize(maxWidth, maxHeight, { fit: "inside", withoutEnlargement: true }));
    },

    async firstFrame(inputPath, outputPath) {
      await execFileAsync(ffmpegPath, [
        "-hide_banner",
        "-loglevel", "error",
        "-y",
        "-i", inputPath,
        "-frames:v", "1",
        "-c:v", "libwebp",
        outputPath,
      ]);
      return encode(sharp(await fs.readFile(outputPath)));
    },

    async roundAvatar(data, size) {
      const r = size / 2;
      const mask = Buffer.from(
        `<svg width="${size}" height="${size}"><circle cx="${r}" cy="${r}" r="${r}" fill="#fff"/></svg>`,
      );
      return sharp(data)
        .resize(size, size, { fit: "cover" })
        .ensureAlpha()
        .composite([{ input: mask, blend: "dest-in" }])
        .png()
        .toBuffer();
    },
  };
}
