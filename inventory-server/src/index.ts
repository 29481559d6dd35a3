#!/usr/bin/env node
// CLI entrypoint: loads .env and starts the inventory server.
import dotenv from "dotenv";
import { hideBin } from "yargs/helpers";
import { run } from "./cli.js";

dotenv.config();

void run(hideBin(process.argv), process.env);
