import { PeerAggregation, PeerSummary, RawLinkRecord } from './types';

export const ROOT_COORDS = '[]';

/**
 * Collapse per-link records into one summary per remote peer address.
 *
 * Byte counters of links sharing an address are summed and their link ids collected.
 * The coordinate path of the first link seen for an address is kept.
 */
export function aggregatePeers(links: Record<string, RawLinkRecord>): PeerAggregation {
  const peers = new Map<string, PeerSummary>();
  let totalBytes = 0;

  for (const [linkId, link] of Object.entries(links)) {
    const existing = peers.get(link.peerAddress);
    if (existing) {
      existing.bytesSent += link.bytesSent;
      existing.bytesReceived += link.bytesReceived;
      existing.linkIds.push(linkId);
    } else {
      peers.set(link.peerAddress, {
        linkIds: [linkId],
        bytesSent: link.bytesSent,
        bytesReceived: link.bytesReceived,
        coords: link.coords,
      });
    }
    totalBytes += link.bytesSent + link.bytesReceived;
  }

  return { peers, totalBytes };
}

/** The root of the spanning tree reports an empty coordinate list. */
export function displayCoords(coords: string): string {
  return coords === ROOT_COORDS ? 'Root' : coords;
}

export function describeLinks(linkIds: string[]): string {
  return linkIds.length > 1
    ? `switch ports ${linkIds.join(', ')}`
    : `switch port ${linkIds[0] ?? ''}`;
}
