/**
 * Athena Client Configuration
 *
 * Credentials come from the default AWS provider chain (env vars, shared
 * profile, instance role). Only the region is taken from GeneratorConfig.
 */

import { AthenaClient } from '@aws-sdk/client-athena';
import type { GeneratorConfig } from '../config';
import { AthenaQueryService } from './query-service';

export function createAthenaClient(config: Pick<GeneratorConfig, 'region'>): AthenaClient {
  return new AthenaClient({ region: config.region });
}

export function createAthenaQueryService(config: GeneratorConfig): AthenaQueryService {
  return new AthenaQueryService(createAthenaClient(config), {
    database: config.database,
    outputLocation: config.outputLocation,
    workgroup: config.workgroup,
  });
}
