export {
  extractReddening,
  IRSA_DUST_URL,
  IrsaDustApiClient,
  parseDustXml,
  type IrsaDustClientConfig,
} from './irsa-dust/irsa-dust.api-client.js';
export type { IrsaDustResponse } from './irsa-dust/irsa-dust.schemas.js';
export { RegistryMetadataProvider } from './providers/registry-metadata-provider.js';
export { SimbadMetadataProvider } from './providers/simbad-metadata-provider.js';
export {
  buildPositionQuery,
  readPositionRow,
  SIMBAD_TAP_URL,
  SimbadApiClient,
  toSimbadIdentifier,
  type SimbadClientConfig,
} from './simbad/simbad.api-client.js';
export type { SimbadPosition, SimbadTapResponse } from './simbad/simbad.schemas.js';
