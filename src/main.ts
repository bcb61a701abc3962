import "dotenv/config";
import { startServer } from "./runtime/startServer.js";

startServer().catch((e) => {
  console.error(e);
  process.exit(1);
});
