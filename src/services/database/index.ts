export { StorageGateway } from './db';
export type { QueryMode, SqlParam, StorageGatewayOptions } from './db';
