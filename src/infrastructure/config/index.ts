export { loadDecoderConfig, loadTransportConfig } from './decoder-config.js';
export type { DecoderConfig, TransportConfig } from './decoder-config.js';
