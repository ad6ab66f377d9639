import { startServer } from "./http/server.js";
import { createInMemoryIndexService } from "./http/indexService.js";

const port = Number(process.env.PORT ?? 3000);
const indexFile = process.env.INDEX_FILE;

const service = createInMemoryIndexService();
if (indexFile) {
  console.log(`Constructing index from file: ${indexFile}`);
  const summary = await service.ingestFile(indexFile);
  console.log(`File successfully read: ${summary.lines} lines, ${summary.words} words.`);
}

const { server } = await startServer({ port, service });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);
