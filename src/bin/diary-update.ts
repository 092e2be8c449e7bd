#!/usr/bin/env node
// getConfig() reads process.env lazily, after this has run
import dotenv from "dotenv";
dotenv.config();

import { runUpdate } from "../cli/update.js";

process.exitCode = await runUpdate(process.argv.slice(2));
