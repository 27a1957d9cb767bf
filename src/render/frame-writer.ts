/**
 * Writes a scenario's frames as numbered DOT files.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Frame } from '../frames/frame-sequence.js';
import { circularLayout } from '../scenario/layout.js';
import type { Scenario } from '../scenario/types.js';
import { RenderError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { renderDot } from './dot-writer.js';

const log = createLogger('frame-writer');

/**
 * File name for the frame at `time`, e.g. `frame_007.dot`.
 */
export function frameFileName(time: number): string {
  return `frame_${String(time).padStart(3, '0')}.dot`;
}

/**
 * Render a frame of `scenario` to DOT, laid out on a circle.
 */
export function renderFrame(scenario: Scenario, frame: Frame): string {
  return renderDot({
    ranks: frame.ranks,
    edges: scenario.edges,
    weights: frame.weights,
    experts: scenario.experts,
    positions: circularLayout(scenario.numNodes),
    frameIndex: frame.index,
    frameTotal: frame.total,
  });
}

/**
 * Write every frame to `<outputFolder>/<scenario name>/frame_NNN.dot`.
 *
 * @returns Paths of the written files, in frame order
 * @throws RenderError (FRAME_WRITE_FAILED) if a directory or file cannot be written
 */
export function writeFrames(scenario: Scenario, frames: Frame[], outputFolder: string): string[] {
  const folder = join(outputFolder, scenario.name);

  try {
    mkdirSync(folder, { recursive: true });
  } catch (error) {
    throw new RenderError(`Failed to create ${folder}`, 'FRAME_WRITE_FAILED', error);
  }

  const written: string[] = [];
  for (const frame of frames) {
    const path = join(folder, frameFileName(frame.time));
    try {
      writeFileSync(path, renderFrame(scenario, frame));
    } catch (error) {
      throw new RenderError(`Failed to write ${path}`, 'FRAME_WRITE_FAILED', error);
    }
    log.info(`${path} created`);
    written.push(path);
  }
  return written;
}
