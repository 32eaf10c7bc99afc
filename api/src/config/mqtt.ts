export interface MqttConfig {
  enabled: boolean;
  brokerUrl: string;
  heartbeatTopic: string;
  statePrefix: string;
}

export function getMqttConfig(): MqttConfig {
  return {
    enabled: process.env.MQTT_ENABLED === 'true',
    brokerUrl: process.env.MQTT_BROKER || 'mqtt://localhost:1883',
    heartbeatTopic: 'heartbeat/+',
    statePrefix: 'power',
  };
}
