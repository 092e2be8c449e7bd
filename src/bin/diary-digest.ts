#!/usr/bin/env node
// getConfig() reads process.env lazily, after this has run
import dotenv from "dotenv";
dotenv.config();

import { runDigest } from "../cli/digest.js";

process.exitCode = await runDigest(process.argv.slice(2));
