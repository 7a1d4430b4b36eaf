#!/usr/bin/env node
import { createLogger } from "@slotwatch/core";

import { main } from "./main.js";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    createLogger("bot").error("fatal error", undefined, err);
    process.exitCode = 1;
  },
);
