import path from "path";
import dotenv from "dotenv";
dotenv.config();

export const LOG_LEVEL = (process.env.LOG_LEVEL || "info").toLowerCase();
export const LOG_FORMAT = (process.env.LOG_FORMAT || "pretty").toLowerCase();
export const AWS_REGION = process.env.AWS_REGION || undefined;
export const DEPLOY_CONFIG = process.env.DEPLOY_CONFIG || "config.yaml";
export const ARTIFACT_NAME = process.env.ARTIFACT_NAME || "artifacts.zip";
export const ARTIFACT_EXTENSIONS = (process.env.ARTIFACT_EXTENSIONS || ".html")
  .split(",")
  .map(ext => ext.trim().toLowerCase())
  .filter(ext => ext.length > 0);

// src/ or dist/ -> package root
export const INSTALL_DIR = process.env.DEPLOY_HOME || path.resolve(__dirname, "..");
