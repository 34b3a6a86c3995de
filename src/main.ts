import "reflect-metadata";
import { container } from "./config/container";
import { CONFIG } from "./config/config";
import { runApp } from "./app";

void runApp({
  container,
  config: CONFIG,
  input: process.stdin,
  output: process.stdout,
}).then((code) => {
  process.exitCode = code;
});
