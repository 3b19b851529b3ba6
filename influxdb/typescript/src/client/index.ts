export { WriteRequestBuilder } from './request-builder.js';
export { InfluxWriter } from './writer.js';
