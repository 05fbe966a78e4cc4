import type { DefineHostInput, HostProvider } from './types';

/**
 * Define a repository hosting provider
 */
export function defineHost(input: DefineHostInput): HostProvider {
  return {
    id: input.id,
    name: input.name,
    auth: input.auth,
    diagnose: input.diagnose,
    createClient: input.createClient,
  };
}
