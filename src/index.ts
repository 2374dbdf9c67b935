import mongoose from "mongoose";
import path from "path";
import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { MongoUserRepository } from "./repositories/users.repository";
import { MongoRefreshTokenRepository } from "./repositories/refreshTokens.repository";
import { MongoOpaqueTokenRepository } from "./repositories/opaqueTokens.repository";

const baseEnvPath = path.resolve(process.cwd(), ".env");
dotenv.config({ path: baseEnvPath });

if (process.env.NODE_ENV === "development") {
  const devEnvPath = path.resolve(process.cwd(), ".env.development");
  dotenv.config({ path: devEnvPath, override: true });
}

// Read once; every component receives this frozen object
const config = loadConfig();

const app = createApp({
  config,
  repos: {
    users: new MongoUserRepository(),
    refreshTokens: new MongoRefreshTokenRepository(),
    opaqueTokens: new MongoOpaqueTokenRepository(),
  },
});

mongoose
  .connect(config.mongoUri)
  .then(() => {
    console.log("Mongo connected to DB:", mongoose.connection.db?.databaseName);
    app.listen(config.port, () => console.log(`API on :${config.port}`));
  })
  .catch((e) => {
    console.error("Mongo connect error", e);
    process.exit(1);
  });
