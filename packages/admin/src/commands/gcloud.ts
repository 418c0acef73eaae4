/**
 * gcloud setup commands
 */

import { GcloudService } from '../services/gcloud.service';
import type { AdminCommand } from './types';

export const gcloudInitCommand: AdminCommand = {
  name: 'gcloud-init',
  description: 'initialize gcloud (recommend using gcloud-init-auth instead)',
  run: (ctx, { runner }) => new GcloudService(runner, ctx.childEnv).init(),
};

export const gcloudAuthCommand: AdminCommand = {
  name: 'gcloud-auth',
  description: 'authenticate to gcloud (recommend using gcloud-init-auth instead)',
  run: (ctx, { runner }) => new GcloudService(runner, ctx.childEnv).authApplicationDefault(),
};

export const gcloudInitAuthCommand: AdminCommand = {
  name: 'gcloud-init-auth',
  description: 'initialize and authenticate to gcloud (required on a fresh machine)',
  run: async (ctx, { runner }) => {
    const gcloud = new GcloudService(runner, ctx.childEnv);
    const initialized = await gcloud.init();
    if (initialized !== 0) return initialized;
    return gcloud.authApplicationDefault();
  },
};
