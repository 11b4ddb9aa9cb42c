import { z } from "zod";
import { ValidationError } from "@skyform/adapters-common";
import { LIGHTSAIL_ATTACHMENT_ID_SEPARATOR } from "../../../constants/defaults";
import { toValidationError } from "../../../utils/provider-utils";

export const ATTACHMENT_RESOURCE_TYPE = "lightsail_lb_attachment";

export const AttachmentConfigSchema = z
  .object({
    lb_name: z.string().min(1),
    instance_name: z.string().min(1),
  })
  .strict();

export type AttachmentConfigInput = z.input<typeof AttachmentConfigSchema>;
export type AttachmentConfig = z.output<typeof AttachmentConfigSchema>;

export interface AttachmentAttributes {
  lb_name: string;
  instance_name: string;
}

/**
 * @throws ValidationError
 */
export function parseAttachmentConfig(input: unknown): AttachmentConfig {
  const result = AttachmentConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError("Lightsail load balancer attachment configuration", result.error);
  }
  return result.data;
}

export function formatAttachmentId(lbName: string, instanceName: string): string {
  return [lbName, instanceName].join(LIGHTSAIL_ATTACHMENT_ID_SEPARATOR);
}

/**
 * Split an attachment id into load balancer and instance name.
 *
 * @throws ValidationError for anything but "LB_NAME,INSTANCE_NAME"
 */
export function parseAttachmentId(id: string): AttachmentAttributes {
  const parts = id.split(LIGHTSAIL_ATTACHMENT_ID_SEPARATOR);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ValidationError(
      `unexpected format of ID (${id}), expected LB_NAME${LIGHTSAIL_ATTACHMENT_ID_SEPARATOR}INSTANCE_NAME`
    );
  }
  return { lb_name: parts[0], instance_name: parts[1] };
}
