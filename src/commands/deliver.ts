import { copyToClipboard, openUrl } from '../system/platform.js';
import { writeLine, type Runtime } from '../shared/runtime.js';
import type { OutputMode } from './options.js';

export interface UrlDelivery {
  command: string;
  url: string;
  open: boolean;
  print: boolean;
  copy: boolean;
  mode: OutputMode;
  dryRun: boolean;
}

export async function deliverUrl(runtime: Runtime, delivery: UrlDelivery): Promise<void> {
  const { url, open, copy, dryRun } = delivery;

  if (delivery.mode === 'json') {
    writeLine(
      runtime.io.stdout,
      JSON.stringify({ command: delivery.command, url, open, copy, dryRun })
    );
  } else if (delivery.print || (!open && !copy) || dryRun) {
    writeLine(runtime.io.stdout, url);
  }

  if (copy) {
    if (dryRun) {
      writeLine(runtime.io.stderr, `dry-run: would copy ${url}`);
    } else {
      await copyToClipboard(runtime, url);
    }
  }
  if (open) {
    if (dryRun) {
      writeLine(runtime.io.stderr, `dry-run: would open ${url}`);
    } else {
      await openUrl(runtime, url);
    }
  }
}
