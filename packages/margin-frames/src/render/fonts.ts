/**
 * Font registration for caption and annotation text
 */

import { existsSync } from 'node:fs';
import { GlobalFonts } from '@napi-rs/canvas';
import { InputMissingError } from '../core/errors.js';

/**
 * Register a TrueType file under `family`
 *
 * @throws InputMissingError if the file is missing or cannot be loaded
 */
export function registerFont(path: string, family: string): void {
  if (!existsSync(path)) {
    throw new InputMissingError(path);
  }
  const key = GlobalFonts.registerFromPath(path, family);
  if (!key) {
    throw new InputMissingError(path);
  }
}

/**
 * CSS font shorthand for canvas text
 */
export function fontSpec(family: string, size: number): string {
  return `${size}px "${family}"`;
}
