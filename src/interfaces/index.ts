export type { ExchangeClient, RawOhlcvRow } from './exchange-client.interface'
export { CONFIG_SECTIONS, ingestionConfigSchema } from './pipeline-config.interface'
export type { IngestionConfig, StorageFormat } from './pipeline-config.interface'
