/**
 * Bootstrap
 *
 * Process-level helpers shared by the CLI commands.
 */

/**
 * Setup graceful shutdown handlers
 *
 * @param cleanup - Async cleanup function to run on shutdown
 * @returns Function that removes the handlers again
 */
export function setupShutdown(cleanup: () => Promise<void>): () => void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return; // Prevent double-shutdown
    shuttingDown = true;

    console.log(`\n[Shutdown] Received ${signal}, cleaning up...`);

    try {
      await cleanup();
      console.log('[Shutdown] Cleanup complete');
      process.exit(0);
    } catch (error) {
      console.error('[Shutdown] Error during cleanup:', error);
      process.exit(1);
    }
  };

  const onSigint = () => void shutdown('SIGINT');
  const onSigterm = () => void shutdown('SIGTERM');

  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  return () => {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };
}

/**
 * Print startup banner
 */
export function printBanner(service: string): void {
  console.log('');
  console.log('╔════════════════════════════════════════╗');
  console.log(`║  UniMate: ${service.padEnd(29)}║`);
  console.log('╚════════════════════════════════════════╝');
  console.log('');
}
