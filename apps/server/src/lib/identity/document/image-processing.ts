import sharp from "sharp";

export interface RgbImage {
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Crop the lower part of a document image, where the MRZ sits.
 *
 * @param fraction - share of the height to keep, measured from the bottom
 */
export async function cropBottomBand(
  image: Buffer,
  fraction: number,
): Promise<Buffer> {
  const pipeline = sharp(image);
  const { width, height } = await pipeline.metadata();
  if (!width || !height) {
    throw new Error("Image dimensions unavailable");
  }
  const bandHeight = Math.max(1, Math.round(height * fraction));
  return pipeline
    .extract({ left: 0, top: height - bandHeight, width, height: bandHeight })
    .greyscale()
    .normalize()
    .png()
    .toBuffer();
}

/**
 * Decode an encoded image to packed 8-bit RGB, honouring EXIF orientation.
 */
export async function decodeToRgb(image: Buffer): Promise<RgbImage> {
  const { data, info } = await sharp(image)
    .rotate()
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}
