#!/usr/bin/env tsx
import "dotenv/config";
import { hideBin } from "yargs/helpers";
import { main } from "./main";

main(hideBin(process.argv)).catch((error) => {
  console.error("[cli] Failed:", error);
  process.exit(1);
});
