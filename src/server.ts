import { startServer } from "./http/server.js";

const port = Number(process.env.PORT ?? 3000);
const smoothing = process.env.CLASSIFIER_SMOOTHING ? Number(process.env.CLASSIFIER_SMOOTHING) : undefined;

const { server } = await startServer({ port, smoothing });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}${smoothing !== undefined ? ` (smoothing ${smoothing})` : ""}`);
