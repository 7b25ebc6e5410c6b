/**
 * Profiles Routes
 *
 * Read-only view of the run profile store:
 * - GET /api/profiles        names of every profile
 * - GET /api/profiles/:ref   one profile, validated as it would be at start
 */

import { Router, Request, Response } from 'express';
import { loadRunConfig, ProfileStore } from '../../config/profile-store';
import { RunConfigDefaults } from '../../models/run-config';
import { sendError } from '../http-errors';

export interface ProfilesConfig {
  profileStore: ProfileStore;
  defaults: RunConfigDefaults;
}

export function createProfilesRoutes(config: ProfilesConfig): Router {
  const router = Router();
  const { profileStore, defaults } = config;

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const profiles = await profileStore.list();
      res.json({ profiles });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/:ref', async (req: Request, res: Response) => {
    const ref = req.params.ref;
    try {
      const runConfig = await loadRunConfig(profileStore, ref, defaults);
      res.json({ ref, config: runConfig });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
