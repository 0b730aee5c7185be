export { AdminClient } from './services/admin/AdminClient';
export type { AdminClientOptions } from './services/admin/AdminClient';
export { aggregatePeers, describeLinks, displayCoords } from './services/peers/PeerAggregator';
export type { PeerAggregation, PeerSummary, RawLinkRecord } from './services/peers/types';
export { PageRenderer } from './services/render/PageRenderer';
export { DashboardService } from './services/dashboard/DashboardService';
export type { SwitchPeerSource } from './services/dashboard/DashboardService';
export { DashboardServer } from './web-server';
export type { DashboardServerOptions } from './web-server';
export { defaultAssets } from './api/routes/assets';
export type { AssetTable } from './api/routes/assets';
export { getConfig } from './config/config';
export type { Config, ConfigOverrides } from './config/config';
export { AdminError, AppError, ConfigurationError } from './utils/errors';
export type { AdminErrorCode } from './utils/errors';
export { parseAdminAddress, parseListenAddress } from './utils/addressUtils';
export type { AdminEndpoint, ListenAddress } from './utils/addressUtils';
