import { logger } from '../../../config/logger';
import { loadHelperSettings } from '../../../config/settings';
import { Dwg2PdfToolchain } from '../../../infrastructure/conversion/dwg2pdf.toolchain';
import { SignalFileConsumer } from '../services/signal-file.consumer';

// Runs inside the air-gapped helper sandbox; the exchange directory is its
// only connection to the coordinator.
const controller = new AbortController();

function handleShutdown(signal: string): void {
  logger.info({ signal }, 'Received shutdown signal');
  controller.abort();
}

process.on('SIGINT', () => handleShutdown('SIGINT'));
process.on('SIGTERM', () => handleShutdown('SIGTERM'));

(async function () {
  try {
    const settings = loadHelperSettings();
    const consumer = new SignalFileConsumer(
      settings.exchangeDir,
      new Dwg2PdfToolchain(settings.converterPath, settings.converterTimeoutMs),
      settings.pollIntervalMs,
    );

    await consumer.run(controller.signal);
    process.exit(0);
  } catch (err) {
    logger.error({ error: err }, 'Conversion helper crashed');
    process.exit(1);
  }
})();
