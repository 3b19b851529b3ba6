export type { InfluxMajorVersion, InfluxVersionStrategy } from './strategy.js';
export { influxV1, influxV2, selectStrategy } from './strategy.js';
export { VersionResolver, VERSION_HEADER, UNKNOWN_VERSION } from './resolver.js';
