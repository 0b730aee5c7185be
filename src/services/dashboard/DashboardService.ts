import fs from 'fs';
import { logger } from '../../utils/logger';
import { AdminError, TemplateError } from '../../utils/errors';
import { RawLinkRecord } from '../peers/types';
import { aggregatePeers } from '../peers/PeerAggregator';
import { PageRenderer } from '../render/PageRenderer';

export interface SwitchPeerSource {
  getSwitchPeers(): Promise<Record<string, RawLinkRecord>>;
}

export interface DashboardServiceOptions {
  nodeName: string;
  templatePath: string;
  source: SwitchPeerSource;
}

export class DashboardService {
  constructor(private readonly options: DashboardServiceOptions) {}

  async loadTemplate(): Promise<string> {
    try {
      return await fs.promises.readFile(this.options.templatePath, 'utf8');
    } catch (error) {
      logger.error('Failed to read page template', {
        templatePath: this.options.templatePath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new TemplateError('Unable to load the page template');
    }
  }

  /**
   * One full query-and-render cycle. Admin socket failures become an in-page notice;
   * anything else propagates.
   */
  async renderPage(): Promise<string> {
    const renderer = new PageRenderer(await this.loadTemplate());

    let links: Record<string, RawLinkRecord>;
    try {
      links = await this.options.source.getSwitchPeers();
    } catch (error) {
      if (error instanceof AdminError) {
        return renderer.renderMessage(this.options.nodeName, error.message);
      }
      throw error;
    }

    const aggregation = aggregatePeers(links);
    logger.debug('Rendering dashboard', {
      links: Object.keys(links).length,
      peers: aggregation.peers.size,
      totalBytes: aggregation.totalBytes,
    });
    return renderer.render(this.options.nodeName, aggregation);
  }
}
