/**
 * Default transport factory: one AWS SDK v3 client per surface and endpoint.
 */

import * as KinesisVideoSdk from '@aws-sdk/client-kinesis-video';
import * as KinesisVideoArchivedMediaSdk from '@aws-sdk/client-kinesis-video-archived-media';
import * as KinesisVideoMediaSdk from '@aws-sdk/client-kinesis-video-media';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { ServiceSurface, SIGNING_SERVICE_NAME } from '../config/kinesis-video-config';
import type { KinesisVideoSession } from '../types/session';
import { createMediaServiceError } from './put-media';
import { collectCommands, CommandConstructor, SdkTransportClient } from './sdk-transport-client';
import type { TransportClientFactory } from './types';

function sdkModuleFor(surface: ServiceSurface): object {
  switch (surface) {
    case ServiceSurface.CONTROL:
      return KinesisVideoSdk;
    case ServiceSurface.MEDIA:
      return KinesisVideoMediaSdk;
    case ServiceSurface.ARCHIVED_MEDIA:
      return KinesisVideoArchivedMediaSdk;
  }
}

/**
 * Create the factory used by `KinesisVideoFacade` when none is supplied.
 *
 * @param session - Shared region/credentials/retry settings for every client
 */
export function createSdkTransportClientFactory(
  session: KinesisVideoSession = {}
): TransportClientFactory {
  const commandTables = new Map<ServiceSurface, Map<string, CommandConstructor>>();

  const commandsFor = (surface: ServiceSurface): Map<string, CommandConstructor> => {
    let table = commandTables.get(surface);
    if (!table) {
      table = collectCommands(sdkModuleFor(surface));
      commandTables.set(surface, table);
    }
    return table;
  };

  const baseConfig = {
    region: session.region,
    credentials: session.credentials,
    maxAttempts: session.maxAttempts,
  };

  return (surface, endpoint) => {
    switch (surface) {
      case ServiceSurface.CONTROL: {
        const client = new KinesisVideoSdk.KinesisVideoClient({
          ...baseConfig,
          endpoint: endpoint ?? session.endpoint,
        });
        return new SdkTransportClient(surface, endpoint, client, commandsFor(surface));
      }

      case ServiceSurface.MEDIA: {
        const client = new KinesisVideoMediaSdk.KinesisVideoMediaClient({ ...baseConfig, endpoint });
        return new SdkTransportClient(surface, endpoint, client, commandsFor(surface), {
          signingName: SIGNING_SERVICE_NAME,
          region: () => client.config.region(),
          credentials: () => client.config.credentials(),
          requestHandler: new NodeHttpHandler(),
          createError: createMediaServiceError,
        });
      }

      case ServiceSurface.ARCHIVED_MEDIA: {
        const client = new KinesisVideoArchivedMediaSdk.KinesisVideoArchivedMediaClient({
          ...baseConfig,
          endpoint,
        });
        return new SdkTransportClient(surface, endpoint, client, commandsFor(surface));
      }
    }
  };
}
