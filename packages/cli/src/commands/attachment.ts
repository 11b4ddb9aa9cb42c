import chalk from "chalk";
import {
  ATTACHMENT_RESOURCE_TYPE,
  LightsailLoadBalancerAttachmentResource,
  parseAttachmentConfig,
} from "@skyform/cloud-providers";
import {
  createContext,
  printAttributes,
  readDesiredConfig,
  withSpinner,
  type GlobalOptions,
  type ResourceCommandOptions,
} from "./context";

const attachments = new LightsailLoadBalancerAttachmentResource();

export async function attachmentCreate(options: ResourceCommandOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);
  const config = parseAttachmentConfig(await readDesiredConfig(options));
  const label = `${config.instance_name} to load balancer ${config.lb_name}`;

  const result = await withSpinner(spinner, `Attaching ${label}`, () =>
    attachments.create(config, meta)
  );
  if (!result.found) {
    spinner.warn(`Attached ${label} but the attachment could not be read back`);
    return;
  }

  store.put(ATTACHMENT_RESOURCE_TYPE, result.id, config, result.attributes);
  await store.save();
  spinner.succeed(`Attached ${chalk.cyan(label)} (${result.id})`);
}

export async function attachmentRead(id: string, options: GlobalOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);

  const result = await withSpinner(spinner, `Reading load balancer attachment ${id}`, () =>
    attachments.read(id, meta)
  );
  if (!result.found) {
    store.remove(ATTACHMENT_RESOURCE_TYPE, id);
    await store.save();
    spinner.warn(`Load balancer attachment ${id} not found, removed from state`);
    return;
  }

  spinner.succeed(`Load balancer attachment ${chalk.cyan(id)}`);
  printAttributes(result.attributes);
}

export async function attachmentDelete(id: string, options: GlobalOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);

  await withSpinner(spinner, `Detaching load balancer attachment ${id}`, () =>
    attachments.delete(id, meta)
  );
  store.remove(ATTACHMENT_RESOURCE_TYPE, id);
  await store.save();
  spinner.succeed(`Detached ${chalk.cyan(id)}`);
}
