import "dotenv/config";
import { createApp } from "./app";
import { ensureConfiguration } from "./utils/configuration";
import { createChatModelEndpoint } from "./utils/generation";
import { connectCredentialStore } from "./utils/userStore";

async function startServer() {
  try {
    const configuration = ensureConfiguration();
    const { store, close } = await connectCredentialStore(configuration);
    const endpoint = createChatModelEndpoint(configuration.generationModel);

    const app = createApp({ store, endpoint, configuration });
    const server = app.listen(configuration.port, () => {
      console.log(`Server running on port ${configuration.port}`);
    });

    const shutdown = () => {
      console.log("Shutting down");
      server.close(() => {
        close().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error("Error closing MongoDB connection:", error);
            process.exit(1);
          }
        );
      });
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  } catch (error) {
    console.error("Error starting server:", error);
    process.exit(1);
  }
}

void startServer();
