import { PageRenderer, NO_PEERS_NOTICE } from '../../../src/services/render/PageRenderer';
import { PeerAggregation, PeerSummary } from '../../../src/services/peers/types';

function aggregation(entries: Array<[string, PeerSummary]>): PeerAggregation {
  const peers = new Map(entries);
  let totalBytes = 0;
  for (const peer of peers.values()) {
    totalBytes += peer.bytesSent + peer.bytesReceived;
  }
  return { peers, totalBytes };
}

function seriesOf(html: string): string[] {
  return [...html.matchAll(/series: \[([^\]]*)\]/g)].map((match) => match[1]);
}

describe('PageRenderer', () => {
  const renderer = new PageRenderer('<title>%HOSTNAME%</title>\n<body>%PEERS%</body>');

  describe('renderPeers', () => {
    it('should render the notice and no charts when there are no peers', () => {
      const html = renderer.renderPeers({ peers: new Map(), totalBytes: 0 });

      expect(html).toBe(`<div>${NO_PEERS_NOTICE}</div>`);
      expect(html).not.toContain('ct-chart');
    });

    it('should render one block per peer', () => {
      const html = renderer.renderPeers(
        aggregation([['200:1::1', { linkIds: ['1'], bytesSent: 1234567, bytesReceived: 10, coords: '[]' }]])
      );

      expect(html).toBe(
        [
          "<div class='node'>",
          "<div class='ct-chart ct-perfect-fourth' id='ct-0'></div>",
          '<script>',
          "new Chartist.Pie('#ct-0', { series: [0, 1234567, 10, 0] }, { donut: true, donutWidth: 25, donutSolid: true, startAngle: 0, showLabel: false });",
          '</script>',
          "<div class='ipv6'>200:1::1</div>",
          '<div>Root attached to switch port 1</div>',
          '<div>1.2 MB sent</div>',
          '<div>10 B received</div>',
          '</div>',
          '',
        ].join('\n')
      );
    });

    it('should describe peers with several links in the plural', () => {
      const html = renderer.renderPeers(
        aggregation([['200:2::2', { linkIds: ['2', '3'], bytesSent: 1, bytesReceived: 2, coords: '[1 4]' }]])
      );

      expect(html).toContain('<div>[1 4] attached to switch ports 2, 3</div>');
    });

    it('should accumulate the offset so each chart shows the remaining peers', () => {
      const html = renderer.renderPeers(
        aggregation([
          ['200:1::1', { linkIds: ['1'], bytesSent: 10, bytesReceived: 20, coords: '[]' }],
          ['200:2::2', { linkIds: ['2'], bytesSent: 5, bytesReceived: 5, coords: '[1]' }],
          ['200:3::3', { linkIds: ['3'], bytesSent: 1, bytesReceived: 1, coords: '[2]' }],
        ])
      );

      expect(seriesOf(html)).toEqual(['0, 10, 20, 12', '30, 5, 5, 2', '40, 1, 1, 0']);
      expect(html).toContain("id='ct-0'");
      expect(html).toContain("id='ct-1'");
      expect(html).toContain("id='ct-2'");
    });

    it('should escape peer derived values', () => {
      const html = renderer.renderPeers(
        aggregation([
          ['<img src=x>', { linkIds: ['"a"'], bytesSent: 0, bytesReceived: 0, coords: "[1]'" }],
        ])
      );

      expect(html).toContain("<div class='ipv6'>&lt;img src=x&gt;</div>");
      expect(html).toContain('<div>[1]&#39; attached to switch port &quot;a&quot;</div>');
    });
  });

  describe('render', () => {
    it('should fill both placeholders of the template', () => {
      const page = renderer.render('my-node', { peers: new Map(), totalBytes: 0 });

      expect(page).toBe(`<title>my-node</title>\n<body><div>${NO_PEERS_NOTICE}</div></body>`);
    });

    it('should replace every occurrence of a placeholder', () => {
      const page = new PageRenderer('%HOSTNAME% / %HOSTNAME%').render('a', { peers: new Map(), totalBytes: 0 });

      expect(page).toBe('a / a');
    });

    it('should escape the node name', () => {
      const page = renderer.render('<b>"node"</b>', { peers: new Map(), totalBytes: 0 });

      expect(page.split('\n')[0]).toBe('<title>&lt;b&gt;&quot;node&quot;&lt;/b&gt;</title>');
    });

    it('should not substitute placeholder tokens found in inserted values', () => {
      const page = new PageRenderer('T:%HOSTNAME%|B:%PEERS%').render('%PEERS%', { peers: new Map(), totalBytes: 0 });

      expect(page).toBe(`T:%PEERS%|B:<div>${NO_PEERS_NOTICE}</div>`);
    });
  });

  describe('renderMessage', () => {
    it('should put an escaped notice in place of the peers', () => {
      const page = renderer.renderMessage('my-node', 'Non-successful response <x>');

      expect(page).toBe(
        "<title>my-node</title>\n<body><div class='notice'>Non-successful response &lt;x&gt;</div></body>"
      );
    });
  });
});
