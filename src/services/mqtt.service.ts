import mqtt, { type MqttClient } from "mqtt";
import { detectionSchema } from "@/schemas/output.schema.js";
import type { OutputController } from "@/services/output.service.js";

export interface MqttServiceOptions {
    brokerUrl: string;
    detectionTopic: string;
}

export function handleDetectionMessage(output: OutputController, message: Buffer): void {
    const { sequence_id, timestamp_us } = detectionSchema.parse(JSON.parse(message.toString()));
    output.notifyEvent(sequence_id, timestamp_us);
}

export function runMqttService(output: OutputController, { brokerUrl, detectionTopic }: MqttServiceOptions): MqttClient {
    console.log(`[MQTT] Connecting to broker: ${brokerUrl}`);

    const client = mqtt.connect(brokerUrl, {
        clientId: `detection-recorder-${Date.now()}`,
        clean: true,
        reconnectPeriod: 5000,
    });

    client.on("connect", () => {
        console.log("[MQTT] Connected to broker");

        client.subscribe(detectionTopic, { qos: 1 }, (err: Error | null) => {
            if (err) {
                console.error("[MQTT] Subscribe error:", err);
            } else {
                console.log(`[MQTT] Subscribed to topic: ${detectionTopic}`);
            }
        });
    });

    client.on("message", (topic: string, message: Buffer) => {
        if (topic !== detectionTopic) return;

        try {
            handleDetectionMessage(output, message);
        } catch (err) {
            console.error("[MQTT] Failed to handle detection message:", err);
        }
    });

    client.on("error", (err: Error) => {
        console.error("[MQTT] Connection error:", err);
    });

    client.on("close", () => {
        console.log("[MQTT] Connection closed");
    });

    return client;
}
