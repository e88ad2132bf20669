import { config } from "./config";
import { createApp } from "./app";

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Server running on ${config.port}`);
  console.log(`inventory=${config.inventoryProvider} llm=${config.llmProvider} writes=${config.allowWrite ? "on" : "off"}`);
  if (config.inventoryProvider === "homebox" && !config.homeboxUrl) {
    console.error("HOMEBOX_URL is not set; tool calls will fail until it is configured");
  }
});
