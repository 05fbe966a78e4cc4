import type { HostProvider, Plugin } from './types';

/**
 * Registry for repository hosting providers
 */
export class HostRegistry {
  private hosts: Map<string, HostProvider> = new Map();

  /**
   * Register every host a plugin ships
   */
  registerPlugin(plugin: Plugin): void {
    for (const host of plugin.hosts) {
      this.registerHost(host);
    }
  }

  registerHost(host: HostProvider): void {
    if (this.hosts.has(host.id)) {
      throw new Error(`Host already registered: ${host.id}`);
    }
    this.hosts.set(host.id, host);
  }

  hasHost(id: string): boolean {
    return this.hosts.has(id);
  }

  getHost(id: string): HostProvider | undefined {
    return this.hosts.get(id);
  }

  /**
   * Get a host by ID, failing with the list of known hosts
   */
  requireHost(id: string): HostProvider {
    const host = this.hosts.get(id);
    if (!host) {
      const known = Array.from(this.hosts.keys()).join(', ') || 'none';
      throw new Error(`Unknown host "${id}". Registered hosts: ${known}`);
    }
    return host;
  }

  getAllHosts(): HostProvider[] {
    return Array.from(this.hosts.values());
  }
}

// Global registry instance
export const registry = new HostRegistry();
