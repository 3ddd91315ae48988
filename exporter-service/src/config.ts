export const SERVICE = 'exporter-service';

export const NODE_ENV = process.env.NODE_ENV || 'development';

// Scrape endpoint
export const METRICS_PORT: number = Number(process.env.METRICS_PORT || 8000);
export const METRICS_HOST: string = process.env.METRICS_HOST || '0.0.0.0';
export const METRICS_ACCESS_LOG: boolean = (process.env.METRICS_ACCESS_LOG || '').toLowerCase() === 'true';

// MQTT connection settings
export const MQTT_URL: string = process.env.MQTT_URL || 'mqtt://127.0.0.1:1883';
export const MQTT_USERNAME: string | undefined = process.env.MQTT_USERNAME || undefined;
export const MQTT_PASSWORD: string | undefined = process.env.MQTT_PASSWORD || undefined;
export const MQTT_TLS_CA: string | undefined = process.env.MQTT_TLS_CA || undefined;
export const MQTT_TLS_CERT: string | undefined = process.env.MQTT_TLS_CERT || undefined;
export const MQTT_TLS_KEY: string | undefined = process.env.MQTT_TLS_KEY || undefined;
export const MQTT_TLS_REJECT_UNAUTHORIZED: boolean = (process.env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false';
// Startup fails if the broker is not reachable within this window
export const MQTT_CONNECT_TIMEOUT_MS: number = Number(process.env.MQTT_CONNECT_TIMEOUT_MS || 30_000);

// Topics published by the upstream RAMSES RF decoder
export const RAMSES_EVENTS_TOPIC: string = process.env.RAMSES_EVENTS_TOPIC || 'ramses/+/messages';
export const RAMSES_TOPOLOGY_TOPIC: string = process.env.RAMSES_TOPOLOGY_TOPIC || 'ramses/+/topology';

// Persistent device/zone name cache
export const NAME_CACHE_FILE: string = process.env.NAME_CACHE_FILE || (
  NODE_ENV === 'production'
    ? '/var/lib/ramses-exporter/name-cache.json'
    : '/tmp/ramses_rf_cache.json'
);

export const LOG_LEVEL: string = (process.env.LOG_LEVEL || 'info').toLowerCase();
