#!/usr/bin/env node

/**
 * Risk Copilot Backend - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConversationStore } from './application/services/ConversationStore.js';
import { OrchestratorService } from './application/services/OrchestratorService.js';
import { ReportService } from './application/services/ReportService.js';
import { PromptBuilder } from './core/prompt/PromptBuilder.js';
import { MistralApiClient } from './infrastructure/http/MistralApiClient.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { createDebugLog } from './utils/debug.js';

async function main() {
  let store: ConversationStore | null = null;
  let webServer: WebServer | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    const debugLog = createDebugLog(config.server.debug);

    store = new ConversationStore({
      lockIdleTtlMs: config.sessions.lockTtlMinutes * 60 * 1000,
      debugLog,
    });

    const promptBuilder = new PromptBuilder({
      budgetChars: config.prompt.contextBudgetChars,
      systemPrompt: config.prompt.systemPrompt,
    });

    const modelClient = new MistralApiClient({
      apiUrl: config.mistral.apiUrl,
      apiKey: config.mistral.apiKey,
      model: config.mistral.model,
      temperature: config.mistral.temperature,
      maxTokens: config.mistral.maxTokens,
      timeoutMs: config.mistral.requestTimeoutMs,
    });

    const retryPolicy = {
      maxAttempts: config.retry.maxAttempts,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      multiplier: 2,
    };

    const orchestrator = new OrchestratorService(store, promptBuilder, modelClient, { retryPolicy, debugLog });
    const reports = new ReportService(modelClient, { retryPolicy, debugLog });

    webServer = new WebServer(orchestrator, reports, store, {
      port: config.server.port,
      corsOrigins: config.server.corsOrigins,
      model: config.mistral.model,
      hasApiKey: Boolean(config.mistral.apiKey),
      debugLog,
    });
    await webServer.start();

    console.error('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (webServer && webServer.isRunning()) {
        await webServer.stop();
      }

      // In-memory history does not outlive the process
      store?.close();

      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        console.error('💥 Error during shutdown:', error);
        process.exit(1);
      });
    };

    process.on('SIGINT', () => onSignal('SIGINT'));
    process.on('SIGTERM', () => onSignal('SIGTERM'));

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    // Cleanup on error
    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }
    store?.close();

    process.exit(1);
  }
}

// Start the server
void main();
