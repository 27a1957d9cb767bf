import type { Command } from '../types.js';
import { configCommand } from './config.js';
import { rankCommand } from './rank.js';
import { renderCommand } from './render.js';
import { serveCommand } from './serve.js';

export const commands: Command[] = [rankCommand, renderCommand, configCommand, serveCommand];
