import dotenv from "dotenv";
import { loadConfig } from "./schema";

dotenv.config();

export const config = loadConfig(process.env);

export type { AppConfig, AssetConfig } from "./schema";
