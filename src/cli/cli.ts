#!/usr/bin/env node
import { main } from '../index.js';

function isMainModule(): boolean {
  // Direct execution, npx and the installed bin all land here
  const mainFile = process.argv[1];
  return Boolean(
    mainFile &&
      (mainFile.endsWith('cli.js') ||
        mainFile.endsWith('cli.ts') ||
        mainFile.includes('snippet-sandbox-mcp')),
  );
}

if (isMainModule()) {
  main().catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}
