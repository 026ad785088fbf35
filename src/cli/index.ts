#!/usr/bin/env node
import { loadEnvFile } from "../config/envFile.js";

loadEnvFile();

const { main } = await import("./main.js");
process.exitCode = await main(process.argv);
