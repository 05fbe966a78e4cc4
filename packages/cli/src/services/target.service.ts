import { readCredential, type SettingsOverrides } from '@reposeed/config';
import { logFullError, registerSecret } from '../logger';
import { createLoggedRunner, openHostSession, type HostSession } from './host.service';
import { loadTarget, printConfigError, type LoadedTarget } from './settings.service';

/**
 * Options shared by every command that works on a whole project
 */
export interface TargetOptions {
  org?: string;
  project?: string;
  tokenFile?: string;
  host?: string;
}

export function targetOverrides(options: TargetOptions): SettingsOverrides {
  return {
    host: options.host,
    organization: options.org,
    project: options.project,
    tokenFile: options.tokenFile,
  };
}

export interface TargetSession extends HostSession {
  settings: LoadedTarget;
}

/**
 * Resolve the target project and credential and open a host session.
 * Settings problems are printed here; the caller gets null.
 */
export async function openTargetSession(options: TargetOptions): Promise<TargetSession | null> {
  let settings: LoadedTarget;
  let credential: string;
  try {
    settings = loadTarget(process.cwd(), targetOverrides(options));
    credential = await readCredential(settings.tokenFile);
  } catch (error) {
    logFullError('settings', error, { options });
    printConfigError(error);
    return null;
  }
  registerSecret(credential);

  const session = openHostSession(settings.host, settings.target, credential, createLoggedRunner());
  return { ...session, settings };
}
