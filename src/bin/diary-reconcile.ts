#!/usr/bin/env node
// getConfig() reads process.env lazily, after this has run
import dotenv from "dotenv";
dotenv.config();

import { runReconcile } from "../cli/reconcile.js";

process.exitCode = await runReconcile(process.argv.slice(2));
