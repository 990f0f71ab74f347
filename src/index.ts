// Express app
import express from "express";
import bodyParser from "body-parser";
import cors from "cors";
import morgan from "morgan";
import handleRoute from "@/routes/index.js";
import { handleError } from "@/middlewares/handleError.middleware.js";

// Servers
import { createServer } from "http";
import { WebSocketServer } from "ws";

// Environments
import { envConfig, toOutputOptions } from "@/config/index.js";

// Services
import DBCore from "@/core/db.core.js";
import runCameraWsService from "@/services/cameraWs.service.js";
import { runMqttService } from "@/services/mqtt.service.js";
import { createNotifier } from "@/services/notifier.service.js";
import { createOutputController } from "@/services/output.service.js";
import { MongoRecordingRepository, RecordingService } from "@/services/recording.service.js";
import { TranscodeManager } from "@/services/transcode.service.js";

// Constants
const { HOST, PORT } = envConfig;

//
// OUTPUT
//
const transcoder = new TranscodeManager();
const recordings = new RecordingService(new MongoRecordingRepository());
recordings.attach(transcoder);

const output = createOutputController(toOutputOptions(envConfig), {
  notifier: createNotifier(envConfig.WEBHOOK_URL, envConfig.WEBHOOK_TIMEOUT),
  transcoder,
});

const app = express();
const httpServer = createServer(app);

const cameraWss = new WebSocketServer({
  noServer: true,
  maxPayload: 100 * 1024 * 1024,
});

httpServer.on("upgrade", (request, socket, head) => {
  const pathname = new URL(request.url ?? "", "http://localhost").pathname;

  if (pathname === "/ws/camera") {
    cameraWss.handleUpgrade(request, socket, head, (ws) => {
      cameraWss.emit("connection", ws, request);
    });
    return;
  }

  console.log(`[WS Upgrade] Rejected path: ${pathname}`);
  socket.destroy();
});

//
// CORS
//
app.use(cors({ origin: "*" }));

//
// MORGAN
//
app.use(morgan("tiny"));

//
// BODY PARSER
//
app.use(bodyParser.urlencoded({ extended: false }));
app.use(bodyParser.json());

//
// DATABASE
//
const db = DBCore.getInstance();
void db.connect();

//
// HANDLE ROUTE
//
handleRoute(app, { output, recordings });

//
// RUN SERVICES
//
runCameraWsService(cameraWss, output); // Path: /ws/camera

const mqttClient = runMqttService(output, {
  brokerUrl: envConfig.MQTT_BROKER_URL,
  detectionTopic: envConfig.MQTT_DETECTION_TOPIC,
});

//
// ERROR HANDLER
//
app.use(handleError);

//
// START SERVER
//
httpServer.listen(PORT, HOST, () => {
  console.log(`Server is running on http://${HOST}:${PORT}`);
  console.log(`Camera WebSocket is listening on ws://${HOST}:${PORT}/ws/camera`);
});

//
// SHUTDOWN
//
function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, closing outputs`);

  try {
    output.close();
  } catch (err) {
    console.error("[Server] Failed to close outputs:", err);
  }

  mqttClient.end();
  cameraWss.close();
  httpServer.close(() => {
    db.disconnect()
      .catch((err: unknown) => console.error("[DB] Error disconnecting from MongoDB", err))
      .finally(() => process.exit(0));
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

export { app, httpServer, output };
