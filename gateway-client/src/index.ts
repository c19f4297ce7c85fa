export { GatewayClient, type GatewayClientOptions, type FetchLike } from './gateway-client.js';
export type {
  CreateViewData,
  ExecuteData,
  HealthData,
  PutData,
  SensorTableData,
  TableExistsData,
  TableSchemaData,
  ViewDetail,
} from './gateway-client.js';
export { loadClientConfig, type ClientConfig } from './config.js';
export { isQueryStatement, splitStatements } from './helpers/split-statements.js';
export type * from './types.js';
