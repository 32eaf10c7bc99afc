import mqtt, { type MqttClient } from 'mqtt';
import { MqttConfig } from '../config/mqtt.js';
import { TransitionNotice } from '../types/index.js';
import { NotificationDeliveryError } from '../types/errors.js';
import { MonitorContext } from '../services/context.js';
import { processHeartbeat } from '../services/heartbeat.js';
import { NotificationDispatcher } from '../services/notifications.js';

let client: MqttClient | null = null;

/**
 * Extract the device key from a heartbeat topic.
 * Topic structure: heartbeat/{secret_key}
 */
export function parseHeartbeatTopic(topic: string): string | null {
  const parts = topic.split('/');
  if (parts.length !== 2 || parts[0] !== 'heartbeat' || parts[1].length === 0) {
    return null;
  }
  return parts[1];
}

/**
 * Topic a device's power state is published on: {prefix}/{device_id}/state
 */
export function stateTopic(prefix: string, deviceId: number): string {
  return `${prefix}/${deviceId}/state`;
}

/**
 * Set up MQTT client: heartbeats in, power states out
 */
export function setupMqttBridge(ctx: MonitorContext, config: MqttConfig): MqttClient {
  const mqttClient = mqtt.connect(config.brokerUrl);
  client = mqttClient;

  mqttClient.on('connect', () => {
    console.log('Connected to MQTT broker');

    mqttClient.subscribe(config.heartbeatTopic, (err) => {
      if (err) {
        console.error(`Failed to subscribe to ${config.heartbeatTopic}:`, err);
      } else {
        console.log(`Subscribed to ${config.heartbeatTopic}`);
      }
    });
  });

  mqttClient.on('message', (topic) => {
    const secretKey = parseHeartbeatTopic(topic);
    if (!secretKey) {
      return;
    }

    processHeartbeat(ctx, secretKey, Date.now())
      .then((result) => {
        if (result.status === 'rejected') {
          console.warn('MQTT heartbeat with unknown key ignored');
        }
      })
      .catch((err: unknown) => {
        console.error('Error processing MQTT heartbeat:', err);
      });
  });

  mqttClient.on('error', (err) => {
    console.error('MQTT error:', err);
  });

  mqttClient.on('close', () => {
    console.log('MQTT connection closed');
  });

  return mqttClient;
}

/**
 * Publishes each transition as a retained on/off state message
 */
export class MqttNotifier implements NotificationDispatcher {
  constructor(private readonly prefix: string) {}

  notify(notice: TransitionNotice): Promise<void> {
    const mqttClient = client;
    if (!mqttClient) {
      return Promise.reject(new NotificationDeliveryError('MQTT client not connected'));
    }

    const topic = stateTopic(this.prefix, notice.deviceId);
    const payload = notice.direction === 'recovered' ? 'on' : 'off';

    return new Promise((resolve, reject) => {
      mqttClient.publish(topic, payload, { retain: true, qos: 1 }, (err) => {
        if (err) {
          reject(new NotificationDeliveryError(`Failed to publish to ${topic}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Close MQTT connection
 */
export async function closeMqttBridge(): Promise<void> {
  if (client) {
    const mqttClient = client;
    client = null;
    await mqttClient.endAsync();
  }
}
