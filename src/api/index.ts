import { loadConfig } from "../config";
import { openStores } from "../stores";
import { LocalArtifactStorage } from "../storage/artifactStorage";
import { createApp } from "./app";

const config = loadConfig();
const { app } = createApp({
  config,
  stores: openStores(config.dataDir),
  storage: new LocalArtifactStorage(config.uploadDir),
});

// Start server
app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`Data directory: ${config.dataDir}`);
});

export default app;
