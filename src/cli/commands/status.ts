import { logger } from '../../utils/logger';
import { getConfig } from '../../config/config';
import { AdminClient } from '../../services/admin/AdminClient';
import { aggregatePeers, describeLinks, displayCoords } from '../../services/peers/PeerAggregator';
import { AdminError } from '../../utils/errors';
import { formatBytes } from '../../utils/format';
import { CliOptions, toOverrides } from '../options';

export async function statusCommand(options: CliOptions): Promise<void> {
  try {
    const config = getConfig(toOverrides(options));
    const adminClient = new AdminClient(config.admin.address, {
      timeout: config.admin.timeout,
      maxResponseBytes: config.admin.maxResponseBytes,
    });

    const { peers, totalBytes } = aggregatePeers(await adminClient.getSwitchPeers());

    console.log(`${config.node.name} Peers`);
    console.log('================');
    console.log('');

    if (peers.size === 0) {
      console.log('There are no connected peers at this time.');
      return;
    }

    for (const [address, peer] of peers) {
      console.log(address);
      console.log(`  ${displayCoords(peer.coords)} attached to ${describeLinks(peer.linkIds)}`);
      console.log(`  ${formatBytes(peer.bytesSent)} sent, ${formatBytes(peer.bytesReceived)} received`);
    }
    console.log('');
    console.log(`Total: ${formatBytes(totalBytes)} across ${peers.size} peer(s)`);
  } catch (error) {
    const message = error instanceof AdminError ? `${error.message} (${error.detail ?? error.code})` : String(error);
    console.error('Failed to get status:', message);
    logger.error('Failed to get status', { error: message });
    process.exit(1);
  }
}
