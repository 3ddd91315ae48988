/**
 * Exporter Service
 * ---------------------------------------------
 * Purpose
 * - Turn the stream of decoded home-heating radio messages into labelled,
 *   leak-free Prometheus series.
 *
 * Responsibilities
 * - Subscribe to decoded events and the decoder's topology snapshot
 * - Map each event onto generic traffic counters and kind-specific gauges
 *   (temperatures, setpoints, zone modes, heat demand, faults, boiler, DHW)
 * - Resolve device/zone names from a persistent cache, falling back to the live topology
 * - Serve `/metrics`, `/health` and `/summary` over HTTP
 *
 * Environment & Dependencies
 * - METRICS_PORT, METRICS_HOST, METRICS_ACCESS_LOG: scrape endpoint
 * - MQTT_URL, MQTT_USERNAME, MQTT_PASSWORD, MQTT_TLS_*: broker connection
 * - RAMSES_EVENTS_TOPIC, RAMSES_TOPOLOGY_TOPIC: decoder topics
 * - NAME_CACHE_FILE: JSON name cache, written atomically (temp file + rename)
 * - LOG_LEVEL: debug | info | warn | error
 *
 * Operational Notes
 * - Events are processed synchronously in the MQTT message callback, one at a time
 * - The name cache is only rewritten when a name is new or changes
 * - A broken event is counted in ramses_message_errors_total and skipped
 * - Shutdown stops intake and the HTTP server; nothing else is flushed
 */
import 'dotenv/config';
import {
  METRICS_ACCESS_LOG,
  METRICS_HOST,
  METRICS_PORT,
  MQTT_CONNECT_TIMEOUT_MS,
  MQTT_PASSWORD,
  MQTT_TLS_CA,
  MQTT_TLS_CERT,
  MQTT_TLS_KEY,
  MQTT_TLS_REJECT_UNAUTHORIZED,
  MQTT_URL,
  MQTT_USERNAME,
  NAME_CACHE_FILE,
  RAMSES_EVENTS_TOPIC,
  RAMSES_TOPOLOGY_TOPIC,
  SERVICE,
} from './config.js';
import { MqttEventSource } from './mqtt.js';
import { ExporterService } from './service.js';
import { registerShutdown } from './shutdown.js';

async function main() {
  console.log(`[${SERVICE}] starting...`);

  const source = new MqttEventSource({
    url: MQTT_URL,
    username: MQTT_USERNAME,
    password: MQTT_PASSWORD,
    tlsCa: MQTT_TLS_CA,
    tlsCert: MQTT_TLS_CERT,
    tlsKey: MQTT_TLS_KEY,
    rejectUnauthorized: MQTT_TLS_REJECT_UNAUTHORIZED,
    eventsTopic: RAMSES_EVENTS_TOPIC,
    topologyTopic: RAMSES_TOPOLOGY_TOPIC,
    connectTimeoutMs: MQTT_CONNECT_TIMEOUT_MS,
  });

  const service = new ExporterService({
    source,
    cacheFile: NAME_CACHE_FILE,
    port: METRICS_PORT,
    host: METRICS_HOST,
    accessLog: METRICS_ACCESS_LOG,
  });

  await service.start();
  registerShutdown(service);

  console.log(`[${SERVICE}] exporter service initialized`);
}

main().catch((e) => {
  console.error(`[${SERVICE}] startup failed:`, e);
  process.exitCode = 1;
});
