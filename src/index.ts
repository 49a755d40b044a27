#!/usr/bin/env node
/**
 * Live Dictation
 *
 * Speak, pause, and the words are typed into the focused window.
 */

import { loadConfig, validateConfig } from './config.js';
import { describeError } from './errors.js';
import { createCommandContext, executeCommand } from './commands.js';

async function main(): Promise<void> {
    const [command, ...args] = process.argv.slice(2);

    if (command === 'daemon') {
        console.log('┌─────────────────────────────────────────────┐');
        console.log('│       Live Dictation Daemon v1.0.0          │');
        console.log('└─────────────────────────────────────────────┘');
    }

    const config = loadConfig();

    try {
        validateConfig(config);
    } catch (error) {
        console.error('\n❌ Configuration Error:');
        console.error(describeError(error));
        process.exit(1);
    }

    if (command === 'daemon') {
        console.log(`\n📋 Configuration:`);
        console.log(`   • Engines: ${config.engines.map(e => `${e.id}:${e.priority}`).join(', ')}`);
        console.log(`   • Injection: ${config.injectStrategy}`);
        console.log(`   • Socket: ${config.socketPath}`);
        console.log(`   • Debug Mode: ${config.debug ? 'enabled' : 'disabled'}`);
    }

    const exitCode = await executeCommand(command, args, createCommandContext(config));

    // SDK clients may hold keep-alive sockets open
    process.exit(exitCode);
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
