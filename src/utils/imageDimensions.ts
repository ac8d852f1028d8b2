/**
 * Image dimension reading for upgrade decisions.
 * Only the header is decoded; pixel data is never loaded.
 */

import sharp from 'sharp';
import { ValidationError } from '../errors/index.js';

export interface ImageDimensions {
  width: number;
  height: number;
}

export type ImageDimensionReader = (imagePath: string) => Promise<ImageDimensions>;

export const readImageDimensions: ImageDimensionReader = async (imagePath) => {
  const metadata = await sharp(imagePath).metadata();
  if (!metadata.width || !metadata.height) {
    throw new ValidationError(`Image has no readable dimensions: ${imagePath}`, {
      service: 'imageDimensions',
      operation: 'readImageDimensions',
      metadata: { imagePath },
    });
  }
  return { width: metadata.width, height: metadata.height };
};
