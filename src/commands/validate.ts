/**
 * validate command - Check the service list and connection settings
 *
 * Never contacts Uptime Kuma or any version endpoint.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { errorMessage } from '../api/errors.js';
import {
  loadServices,
  resolveSessionConfig,
  type KumaConnectionOptions,
  type LoadedServices,
  type ServiceEntry,
} from '../config/index.js';
import { buildVersionTag } from '../reconcilers/tags/types.js';
import { header, info, success, warn, verbose, error as printError } from '../utils/output.js';

export interface ValidateOptions extends KumaConnectionOptions {
  servicesJson?: string;
  servicesFile?: string;
}

export interface ValidatedService {
  index: number;
  monitorName: string;
  valid: boolean;
  tagPrefix?: string;
  versionEndpoint?: string;
  issues: string[];
}

export interface ValidateResult {
  source: 'env' | 'file';
  path?: string;
  services: ValidatedService[];
  /** Problem with the connection settings, if any */
  connectionError?: string;
}

function describeEntry(entry: ServiceEntry): ValidatedService {
  if (entry.ok) {
    return {
      index: entry.index,
      monitorName: entry.spec.monitorName,
      valid: true,
      tagPrefix: entry.spec.tagPrefix,
      versionEndpoint: entry.spec.versionEndpoint.toString(),
      issues: [],
    };
  }
  return { index: entry.index, monitorName: entry.label, valid: false, issues: entry.issues };
}

/**
 * Execute the validate command
 */
export async function validateCommand(
  ctx: CommandContext,
  options: ValidateOptions = {}
): Promise<CommandResult<ValidateResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';

  verbose('Executing validate command', globalOpts.verbose);

  let loaded: LoadedServices;
  try {
    loaded = await loadServices({
      servicesJson: options.servicesJson,
      servicesFile: options.servicesFile,
    });
  } catch (err) {
    const message = errorMessage(err);
    if (human) printError(message);
    return { success: false, message };
  }

  const services = loaded.entries.map(describeEntry);

  let connectionError: string | undefined;
  try {
    const config = resolveSessionConfig(options);
    verbose(`Uptime Kuma: ${config.baseUrl} (${config.credentials.mode} auth)`, globalOpts.verbose);
  } catch (err) {
    connectionError = errorMessage(err);
  }

  if (human) {
    header('Service Configuration');
    info(`Source: ${loaded.path ?? 'SERVICES_CONFIG'}`);
    for (const service of services) {
      if (service.valid && service.tagPrefix !== undefined) {
        success(
          `${service.monitorName}: ${service.versionEndpoint} -> ${buildVersionTag(service.tagPrefix, '<version>')}`
        );
      } else {
        printError(`${service.monitorName}: ${service.issues.join('; ')}`);
      }
    }
    if (connectionError) {
      warn(connectionError);
    }
  }

  const invalid = services.filter((service) => !service.valid);
  const errors = [
    ...invalid.map((service) => `${service.monitorName}: ${service.issues.join('; ')}`),
    ...(connectionError ? [connectionError] : []),
  ];

  return {
    success: errors.length === 0,
    message:
      errors.length === 0
        ? `${services.length} service(s) valid`
        : `${invalid.length} of ${services.length} service(s) invalid${connectionError ? ', connection settings incomplete' : ''}`,
    data: { source: loaded.source, path: loaded.path, services, connectionError },
    errors: errors.length > 0 ? errors : undefined,
  };
}
