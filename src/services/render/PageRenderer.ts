import { PeerAggregation } from '../peers/types';
import { describeLinks, displayCoords } from '../peers/PeerAggregator';
import { escapeHtml, formatBytes } from '../../utils/format';

export const HOSTNAME_PLACEHOLDER = '%HOSTNAME%';
export const PEERS_PLACEHOLDER = '%PEERS%';
export const NO_PEERS_NOTICE = 'There are no connected peers at this time.';

const CHART_OPTIONS = '{ donut: true, donutWidth: 25, donutSolid: true, startAngle: 0, showLabel: false }';

/**
 * Turns aggregated peer statistics into the dashboard page.
 *
 * Every peer gets a donut chart whose four slices are: bytes of peers drawn before it,
 * its own sent bytes, its own received bytes, and the bytes of every peer after it.
 */
export class PageRenderer {
  constructor(private readonly template: string) {}

  renderPeers({ peers, totalBytes }: PeerAggregation): string {
    if (peers.size === 0) {
      return `<div>${NO_PEERS_NOTICE}</div>`;
    }

    let html = '';
    let count = 0;
    let offset = 0;

    for (const [address, peer] of peers) {
      const remainder = totalBytes - offset - peer.bytesSent - peer.bytesReceived;
      const series = [offset, peer.bytesSent, peer.bytesReceived, remainder].join(', ');
      const ports = describeLinks(peer.linkIds);

      html += "<div class='node'>\n";
      html += `<div class='ct-chart ct-perfect-fourth' id='ct-${count}'></div>\n`;
      html += `<script>\nnew Chartist.Pie('#ct-${count}', { series: [${series}] }, ${CHART_OPTIONS});\n</script>\n`;
      html += `<div class='ipv6'>${escapeHtml(address)}</div>\n`;
      html += `<div>${escapeHtml(displayCoords(peer.coords))} attached to ${escapeHtml(ports)}</div>\n`;
      html += `<div>${formatBytes(peer.bytesSent)} sent</div>\n`;
      html += `<div>${formatBytes(peer.bytesReceived)} received</div>\n`;
      html += '</div>\n';

      count++;
      offset += peer.bytesSent + peer.bytesReceived;
    }

    return html;
  }

  render(nodeName: string, aggregation: PeerAggregation): string {
    return this.fill(nodeName, this.renderPeers(aggregation));
  }

  /** Page with a notice in place of the peer list, used when the admin query fails. */
  renderMessage(nodeName: string, message: string): string {
    return this.fill(nodeName, `<div class='notice'>${escapeHtml(message)}</div>`);
  }

  // Single pass, so a placeholder token inside an inserted value is left alone
  private fill(nodeName: string, peersHtml: string): string {
    return this.template.replace(/%HOSTNAME%|%PEERS%/g, (token) =>
      token === HOSTNAME_PLACEHOLDER ? escapeHtml(nodeName) : peersHtml
    );
  }
}
