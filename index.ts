import { createServer } from "node:http";
import type { IncomingMessage } from "node:http";
import { createApp } from "./app";
import { getConfig, loadEnvFile } from "./config/environment";
import { createModelService } from "./services/model-service";

loadEnvFile();

const config = getConfig();

const modelService = createModelService({
  baseUrl: config.modelServiceUrl,
  timeoutMs: config.modelServiceTimeoutMs,
  classifyTimeoutMs: config.modelClassifyTimeoutMs,
});

const app = createApp({ config, modelService });

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

// Only start the server if this file is executed directly
if (require.main === module) {
  console.log(`Server is starting on port ${config.port}...`);

  const server = createServer(async (req, res) => {
    try {
      const url = new URL(
        req.url || "/",
        `http://${req.headers.host || "localhost"}`
      );

      // Convert Node's req/res to Fetch API Request/Response
      const method = req.method || "GET";
      const headers = new Headers();

      Object.entries(req.headers).forEach(([key, value]) => {
        if (value)
          headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit = { method, headers };

      // Request bodies are small JSON documents, buffer them
      if (!["GET", "HEAD", "OPTIONS"].includes(method)) {
        requestInit.body = await readBody(req);
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        if (key.toLowerCase() !== "transfer-encoding") {
          res.setHeader(key, value);
        }
      });

      res.end(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      console.error("Server error:", error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      if (!res.writableEnded) {
        res.end(
          JSON.stringify({
            error: "Internal Server Error",
            message: error instanceof Error ? error.message : String(error),
          })
        );
      }
    }
  });

  // Model availability never blocks startup
  modelService
    .loadModels()
    .then((status) => {
      const available = [status.classifier, status.forecaster, status.scaler].filter(Boolean).length;
      console.log(`Models available: ${available}/3`);
    })
    .catch((error: unknown) => {
      console.error("Model probe failed:", error);
    });

  server.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}`);
  });
}

export default app;
