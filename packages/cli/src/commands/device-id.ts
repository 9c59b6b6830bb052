/**
 * Device Id Command - clipscrub device-id
 *
 * Prints the id a license must be bound to for this machine.
 */

import { Command } from 'commander';
import { requireFeature } from 'clipscrub-core';

import type { CliContext } from '../context.js';

export function deviceIdAction(context: CliContext): void {
  requireFeature(context.license().features, 'license:device-id');
  console.log(context.deviceId());
}

export function createDeviceIdCommand(context: CliContext): Command {
  return new Command('device-id')
    .description('Print the device id used for license binding')
    .action(() => {
      deviceIdAction(context);
    });
}
