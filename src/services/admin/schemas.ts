import { z } from 'zod';

/**
 * Outer shape shared by every admin socket reply. Fields are left loose here so a
 * missing or mistyped `status` can be reported as an unsuccessful reply instead of
 * a decoding failure.
 */
export const adminEnvelopeSchema = z.object({
  status: z.unknown(),
  error: z.unknown(),
  response: z.unknown(),
});

export const switchPeerSchema = z.object({
  ip: z.string(),
  bytes_sent: z.number().int().nonnegative(),
  bytes_recvd: z.number().int().nonnegative(),
  coords: z.string(),
});

export const getSwitchPeersResponseSchema = z.object({
  switchpeers: z.record(switchPeerSchema),
});

export type AdminRequest = { request: string } & Record<string, unknown>;
export type SwitchPeer = z.infer<typeof switchPeerSchema>;
export type GetSwitchPeersResponse = z.infer<typeof getSwitchPeersResponseSchema>;

export function describeIssues(error: z.ZodError, prefix: string[] = []): string {
  return error.issues
    .map((issue) => {
      const path = [...prefix, ...issue.path];
      return `${path.length > 0 ? path.join('.') : '(root)'}: ${issue.message}`;
    })
    .join('; ');
}
