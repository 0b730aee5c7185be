/** One active link as reported by the admin socket, keyed by its link id. */
export interface RawLinkRecord {
  peerAddress: string;
  bytesSent: number;
  bytesReceived: number;
  coords: string;
}

export interface PeerSummary {
  linkIds: string[];
  bytesSent: number;
  bytesReceived: number;
  coords: string;
}

export interface PeerAggregation {
  peers: Map<string, PeerSummary>;
  totalBytes: number;
}
