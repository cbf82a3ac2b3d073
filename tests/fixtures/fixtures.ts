import Fs from 'node:fs';
import Path from 'node:path';
import ImageManipulator from '../../src/minecraft/image/ImageManipulator.js';

/**
 * 2x2 PNG without an alpha channel:
 * black and white in the top row, yellow and blue in the bottom row
 */
export function readRgbTestPng(): Promise<Buffer> {
  return Fs.promises.readFile(Path.join(__dirname, 'rgb-test.png'));
}

export async function loadRgbTestImage(): Promise<ImageManipulator> {
  return ImageManipulator.createByImage(await readRgbTestPng());
}
