import type { z } from 'zod';
import type { HostContext } from '@reposeed/core';

export const AZURE_DEVOPS_DOMAIN = 'dev.azure.com';

export function organizationUrl(organization: string): string {
  return `https://${AZURE_DEVOPS_DOMAIN}/${encodeURIComponent(organization)}`;
}

/**
 * Run an `az` sub-command scoped to the context's organization and project.
 * The organization and project go on every call, so nothing depends on
 * `az devops configure --defaults`.
 */
export async function runAz(context: HostContext, args: string[]): Promise<string> {
  const { target, credential, run } = context;
  const output = await run(
    'az',
    [
      ...args,
      '--organization',
      organizationUrl(target.organization),
      '--project',
      target.project,
      '--output',
      'json',
    ],
    {
      env: { AZURE_DEVOPS_EXT_PAT: credential },
      redact: [credential],
    }
  );
  return output.stdout;
}

export function parseOutput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, stdout: string, what: string): T {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    throw new Error(`Unexpected ${what} output: not JSON`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Unexpected ${what} output: ${issue.path.join('.') || '(root)'} ${issue.message}`);
  }
  return result.data;
}
