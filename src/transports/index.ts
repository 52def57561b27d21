/**
 * Transport layer exports
 */

export {
  createHttpApp,
  startHttpTransport,
  stopHttpTransport,
  isHttpEnabled,
  getHttpConfig,
  type HttpTransportConfig,
} from './http.js';
