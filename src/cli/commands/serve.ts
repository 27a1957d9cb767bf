import type { Command } from '../types.js';
import { getNumberFlag } from '../utils.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';
import { ConfigError } from '../../utils/errors.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Serve frames over HTTP',
  usage: 'trustflow serve [--port <port>]',
  handler: async (args) => {
    const config = loadConfig({ cliOverrides: { dashboard: { port: getNumberFlag(args, 'port') } } });
    const errors = validateExternalConfig(config);
    if (errors.length > 0) {
      throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
    }
    const { startDashboard } = await import('../../dashboard/server.js');
    await startDashboard(config.dashboard.port);
  },
};
