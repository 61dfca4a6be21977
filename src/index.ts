import dotenv from "dotenv";
import { createApp, createDeps } from "./app";
import { loadConfig } from "./config";

dotenv.config();

const config = loadConfig();
const app = createApp(createDeps(config), config);

app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
  if (!config.googleApiKey) console.log("GOOGLE_API_KEY not set - text is embedded with the offline hashing embedder");
});

export { app };
