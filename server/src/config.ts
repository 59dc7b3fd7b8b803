import dotenv from "dotenv";
import os from "os";
import path from "path";
dotenv.config();

export const NODE_ENV = process.env.NODE_ENV ?? "development";
export const PORT = Number(process.env.PORT ?? 8000);

export const PUBLIC_ORIGIN = process.env.PUBLIC_ORIGIN
  ? process.env.PUBLIC_ORIGIN.split(",").map(v => v.trim())
  : ["http://localhost:5173", "http://localhost:8000"];

export const SETTINGS_PATH = process.env.SETTINGS_PATH || path.join(os.homedir(), ".sketch-refine.json");
