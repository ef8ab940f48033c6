import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunStore } = await import("./run_store.js");
const { createApp } = await import("./app.js");
const { dataRootAbs, resultsRootAbs } = await import("./utils.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5060;
  return Number.isFinite(port) && port > 0 ? port : 5060;
}

const store = new RunStore();
const app = createApp(store);

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
  console.log(`run data: ${dataRootAbs()}, results: ${resultsRootAbs()}`);
});
