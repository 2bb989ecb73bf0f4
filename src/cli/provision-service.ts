#!/usr/bin/env node

/**
 * provision-service CLI
 *
 * Starts (or reuses) the shared inference service, provisions the models
 * named on the command line, and prints where the service can be reached.
 * The container keeps running after the command exits.
 */

import { describeError, ProvisionerError } from '../api/errors.js';
import { initializeConfig, toProvisionerOptions } from '../config/loader.js';
import { InMemoryPropertyRegistry } from '../services/property-registry.js';
import { ServiceLifecycleManager } from '../services/lifecycle-manager.js';
import { ProvisioningOutcome } from '../types/models.js';
import { parseArgs, usage, type CliArgs } from './args.js';

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    console.error(usage());
    return 1;
  }

  if (args.help) {
    console.log(usage());
    return 0;
  }

  const options = toProvisionerOptions(initializeConfig(args.config));
  const manager = new ServiceLifecycleManager({ options });
  const properties = new InMemoryPropertyRegistry();

  const { instance, results } = await manager.startIfNeeded({
    models: args.models,
    apiKey: args.apiKey,
    registry: properties,
    label: args.label,
  });

  for (const result of results) {
    const note = result.outcome === ProvisioningOutcome.READY_TIMEOUT ? ' (not confirmed ready)' : '';
    console.log(`${result.descriptor.capability} ${result.descriptor.modelId}: ${result.outcome}${note}`);
  }

  console.log(`Service '${instance.label}' ${instance.reused ? 'reused' : 'started'} on ${instance.host}:${instance.port}`);
  console.log(`API endpoint: ${instance.baseUrl}`);
  console.log(`Health check: ${instance.baseUrl}${options.health.path}`);
  console.log(`API docs: ${instance.baseUrl}/docs`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ProvisionerError) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    process.exitCode = 1;
  });
