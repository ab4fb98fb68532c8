/**
 * MqttTransport: route negotiation through an MQTT broker.
 *
 * Requests are published to fleet/route/request; the bridge on the service side
 * answers on fleet/route/response/<droneId>. Payloads are the same JSON objects
 * the WebSocket transport sends, optionally wrapped in a {msg_id, ts, payload}
 * envelope.
 *
 * Reconnection is left to BaseTransport (the client's own reconnectPeriod is
 * disabled) so both transports retry on the same fixed interval.
 */

import mqtt from 'mqtt';
import type { MqttClient } from 'mqtt';
import { BaseTransport } from './BaseTransport';
import { RouteTopics } from './topics';
import { NotConnectedError } from '../errors';
import { RouteProtocolService, isRecord } from '../RouteProtocol';

export class MqttTransport extends BaseTransport {
  protected readonly name = 'MqttTransport';
  private client: MqttClient | null = null;

  protected openConnection(): void {
    const clientId = this.config.clientId || `fleet-sim-${Date.now()}`;
    const client = mqtt.connect(this.config.url, {
      clientId,
      username: this.config.username,
      password: this.config.password,
      clean: true,
      reconnectPeriod: 0,
      connectTimeout: 30000,
    });
    this.client = client;

    client.on('connect', () => {
      client.subscribe(RouteTopics.allRouteResponses(), { qos: 1 }, (error) => {
        if (error) {
          console.error(`[${this.name}] Failed to subscribe to route responses:`, error);
          client.end(true);
          return;
        }
        console.log(`[${this.name}] Subscribed to ${RouteTopics.allRouteResponses()}`);
        this.handleOpen();
      });
    });

    client.on('message', (topic: string, payload: Buffer) => {
      this.handleMessage(topic, payload);
    });

    client.on('error', (error: Error) => {
      console.error(`[${this.name}] Connection error:`, error.message);
    });

    client.on('close', () => {
      if (this.client !== client) {
        return;
      }
      this.client = null;
      client.end(true);
      this.handleDisconnect();
    });
  }

  protected async closeConnection(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }
    await new Promise<void>((resolve) => {
      client.end(false, {}, () => resolve());
    });
  }

  protected sendRaw(data: string): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.reject(new NotConnectedError(this.name));
    }

    return new Promise((resolve, reject) => {
      client.publish(RouteTopics.routeRequest(), data, { qos: 1 }, (error?: Error) => {
        if (error) {
          console.error(`[${this.name}] Failed to publish route request:`, error);
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  private handleMessage(topic: string, payload: Buffer): void {
    const data = RouteProtocolService.parseFrame(payload.toString('utf8'));
    if (data === null) {
      console.warn(`[${this.name}] Ignoring non-JSON message on ${topic}`);
      return;
    }

    // Extract payload from envelope if present
    const message = isRecord(data) && isRecord(data.payload) ? data.payload : data;
    this.dispatch(message);
  }
}
