import { logger } from '../../utils/logger';
import { getConfig } from '../../config/config';
import { parseAdminAddress, parseListenAddress } from '../../utils/addressUtils';
import { AdminClient } from '../../services/admin/AdminClient';
import { DashboardService } from '../../services/dashboard/DashboardService';
import { DashboardServer } from '../../web-server';
import { defaultAssets } from '../../api/routes/assets';
import { CliOptions, toOverrides } from '../options';

let server: DashboardServer | undefined;

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);

  try {
    if (server) {
      await server.stop();
    }
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error });
    process.exit(1);
  }
}

export async function startCommand(options: CliOptions): Promise<void> {
  try {
    const config = getConfig(toOverrides(options));
    const endpoint = parseAdminAddress(config.admin.address);
    const listenAddress = parseListenAddress(config.server.listenAddress);

    logger.info(`Using node name: ${config.node.name}`);
    logger.info(`Using admin socket address: ${config.admin.address}`);
    logger.info(`Listening on address: ${config.server.listenAddress}`);

    const adminClient = new AdminClient(endpoint, {
      timeout: config.admin.timeout,
      maxResponseBytes: config.admin.maxResponseBytes,
    });
    const dashboardService = new DashboardService({
      nodeName: config.node.name,
      templatePath: config.web.templatePath,
      source: adminClient,
    });

    server = new DashboardServer({
      dashboardService,
      assets: defaultAssets(config.web.publicDir),
    });
    await server.start(listenAddress);

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start dashboard', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}
