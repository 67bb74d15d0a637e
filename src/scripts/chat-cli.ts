#!/usr/bin/env node
import { createInterface } from "readline/promises";
import { loadConfigFromDotenv } from "../config";
import { ChatbotError } from "../errors";
import {
  createOrchestrator,
  createSharedCollaborators,
} from "../services/orchestrator.service";
import type { ChatbotResponse } from "../types";
import { setLogLevel } from "../utils/logger";

function printResponse(response: ChatbotResponse) {
  console.log(`\n${response.message}\n`);

  if ("total_cost" in response.data) {
    const { ingredient_costs, total_cost } = response.data;
    console.log("🛒 Shopping list");
    for (const [name, cost] of Object.entries(ingredient_costs)) {
      console.log(`  - ${name}: $${cost.toFixed(2)}`);
    }
    console.log(`  Total: $${total_cost.toFixed(2)}\n`);
  }
}

async function runChat() {
  const config = loadConfigFromDotenv();
  // Keep the terminal readable unless asked otherwise
  setLogLevel(process.env.LOG_LEVEL ? config.logLevel : "warn");

  const orchestrator = createOrchestrator(
    "cli",
    config,
    createSharedCollaborators(config)
  );

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log("🧑‍🍳 Tell me what's in your kitchen, or ask me anything about cooking. Ctrl+D to quit.\n");

  try {
    for (;;) {
      let line: string;
      try {
        line = await rl.question("> ");
      } catch {
        // stdin closed
        break;
      }
      if (line.trim() === "/quit") break;
      if (line.trim() === "") continue;

      try {
        printResponse(await orchestrator.processMessage(line));
      } catch (error) {
        if (error instanceof ChatbotError) {
          console.error(`❌ ${error.message}`);
        } else {
          throw error;
        }
      }
    }
  } finally {
    rl.close();
  }
}

runChat().catch((error) => {
  console.error("Chat failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
