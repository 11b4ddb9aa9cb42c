/**
 * Tagging Service
 *
 * Adds and removes tags on any Lightsail resource by name.
 */

import {
  LightsailClient,
  TagResourceCommand,
  UntagResourceCommand,
} from "@aws-sdk/client-lightsail";
import type { OperationSnapshot, TagMap } from "@skyform/adapters-common";
import { toLightsailTags, toOperationSnapshots } from "../types";

export class TaggingService {
  constructor(private readonly client: LightsailClient) {}

  async tagResource(resourceName: string, tags: TagMap): Promise<OperationSnapshot[]> {
    const result = await this.client.send(
      new TagResourceCommand({ resourceName, tags: toLightsailTags(tags) })
    );

    return toOperationSnapshots(result.operations);
  }

  async untagResource(resourceName: string, tagKeys: string[]): Promise<OperationSnapshot[]> {
    const result = await this.client.send(
      new UntagResourceCommand({ resourceName, tagKeys })
    );

    return toOperationSnapshots(result.operations);
  }
}
