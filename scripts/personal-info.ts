import { clientOptionsFromConfig } from "../src/config.js";
import { OuraClient } from "../src/oura/client.js";

async function main(): Promise<void> {
  const client = new OuraClient(clientOptionsFromConfig());
  const info = await client.getPersonalInfo();
  console.log(JSON.stringify(info, null, 2));
}

main().catch((err) => {
  console.error("Failed to fetch personal info:", err);
  process.exit(1);
});
