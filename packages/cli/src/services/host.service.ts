/**
 * Host registration and session setup shared by every command
 */

import type { HostTarget } from '@reposeed/shared';
import {
  createCommandRunner,
  registry,
  type CommandRunner,
  type HostContext,
  type HostProvider,
  type PipelineHostClient,
  type HostRegistry,
  type Plugin,
  type RepositoryHostClient,
} from '@reposeed/core';
import azureDevOps from '@reposeed/plugin-azure-devops';
import { logCommand, logOutput } from '../logger';

export const BUILTIN_PLUGINS: Plugin[] = [azureDevOps];

/**
 * Register the built-in hosts once
 */
export function ensureHostsRegistered(hostRegistry: HostRegistry = registry): HostRegistry {
  for (const plugin of BUILTIN_PLUGINS) {
    for (const host of plugin.hosts) {
      if (!hostRegistry.hasHost(host.id)) {
        hostRegistry.registerHost(host);
      }
    }
  }
  return hostRegistry;
}

/**
 * Runner whose invocations and output go to the debug log
 */
export function createLoggedRunner(): CommandRunner {
  return createCommandRunner({
    onCommand: (commandLine, cwd) => logCommand(commandLine, cwd),
    onOutput: logOutput,
  });
}

export interface HostSession {
  provider: HostProvider;
  context: HostContext;
  client: RepositoryHostClient;
}

export function openHostSession(
  hostId: string,
  target: HostTarget,
  credential: string,
  run: CommandRunner,
  hostRegistry: HostRegistry = registry
): HostSession {
  const provider = ensureHostsRegistered(hostRegistry).requireHost(hostId);
  const context: HostContext = { target, credential, run };
  return {
    provider,
    context,
    client: provider.createClient(context),
  };
}

/**
 * Pipeline client for the session's host; not every host has pipelines
 */
export function openPipelineClient(session: HostSession): PipelineHostClient {
  const { provider, context } = session;
  if (!provider.createPipelineClient) {
    throw new Error(`${provider.name} has no pipelines or variable groups`);
  }
  return provider.createPipelineClient(context);
}
