import { aggregatePeers, describeLinks, displayCoords } from '../../../src/services/peers/PeerAggregator';
import { RawLinkRecord } from '../../../src/services/peers/types';

function link(peerAddress: string, bytesSent: number, bytesReceived: number, coords = '[1]'): RawLinkRecord {
  return { peerAddress, bytesSent, bytesReceived, coords };
}

describe('PeerAggregator', () => {
  describe('aggregatePeers', () => {
    it('should return no peers and zero bytes for no links', () => {
      const result = aggregatePeers({});

      expect(result.peers.size).toBe(0);
      expect(result.totalBytes).toBe(0);
    });

    it('should group links sharing a peer address into one summary', () => {
      const result = aggregatePeers({
        '1': link('200:aaaa::1', 100, 50, '[2 1]'),
        '4': link('200:aaaa::1', 25, 5, '[2 1]'),
      });

      expect(result.peers.size).toBe(1);
      expect(result.peers.get('200:aaaa::1')).toEqual({
        linkIds: ['1', '4'],
        bytesSent: 125,
        bytesReceived: 55,
        coords: '[2 1]',
      });
    });

    it('should keep peers with different addresses apart', () => {
      const result = aggregatePeers({
        '1': link('200:aaaa::1', 10, 20),
        '2': link('200:bbbb::2', 5, 5),
      });

      expect([...result.peers.keys()]).toEqual(['200:aaaa::1', '200:bbbb::2']);
      expect(result.peers.get('200:bbbb::2')?.linkIds).toEqual(['2']);
    });

    it('should keep the coordinate path of the first link seen for a peer', () => {
      const result = aggregatePeers({
        '1': link('200:aaaa::1', 1, 1, '[3]'),
        '2': link('200:aaaa::1', 1, 1, '[4]'),
      });

      expect(result.peers.get('200:aaaa::1')?.coords).toBe('[3]');
    });

    it('should conserve the byte totals of the raw links', () => {
      const links: Record<string, RawLinkRecord> = {
        '1': link('200:aaaa::1', 1000, 2000),
        '2': link('200:bbbb::2', 3, 4),
        '3': link('200:aaaa::1', 50, 60),
        '7': link('200:cccc::3', 0, 0),
        '9': link('200:bbbb::2', 123456789, 987654321),
      };

      const result = aggregatePeers(links);

      const rawTotal = Object.values(links).reduce((sum, l) => sum + l.bytesSent + l.bytesReceived, 0);
      const summaryTotal = [...result.peers.values()].reduce(
        (sum, peer) => sum + peer.bytesSent + peer.bytesReceived,
        0
      );
      expect(result.totalBytes).toBe(rawTotal);
      expect(summaryTotal).toBe(rawTotal);
      expect(result.peers.size).toBe(3);
    });
  });

  describe('displayCoords', () => {
    it('should show an empty coordinate list as Root', () => {
      expect(displayCoords('[]')).toBe('Root');
    });

    it('should show any other coordinate path verbatim', () => {
      expect(displayCoords('[1 5 2]')).toBe('[1 5 2]');
      expect(displayCoords('')).toBe('');
    });
  });

  describe('describeLinks', () => {
    it('should use the singular for one link', () => {
      expect(describeLinks(['3'])).toBe('switch port 3');
    });

    it('should use the plural and join several links', () => {
      expect(describeLinks(['3', '8'])).toBe('switch ports 3, 8');
    });
  });
});
