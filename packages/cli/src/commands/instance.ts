import chalk from "chalk";
import { NotFoundError } from "@skyform/adapters-common";
import {
  INSTANCE_RESOURCE_TYPE,
  LightsailInstanceResource,
  parseInstanceConfig,
  planInstanceChange,
  refreshInstanceConfig,
  type InstanceAttributes,
  type InstanceConfig,
} from "@skyform/cloud-providers";
import {
  createContext,
  printAttributes,
  readDesiredConfig,
  withSpinner,
  type CommandContext,
  type GlobalOptions,
  type ResourceCommandOptions,
} from "./context";

const instances = new LightsailInstanceResource();

async function createTracked(
  { meta, store, spinner }: CommandContext,
  config: InstanceConfig
): Promise<void> {
  const result = await withSpinner(spinner, `Creating Lightsail instance ${config.name}`, () =>
    instances.create(config, meta)
  );

  if (!result.found) {
    spinner.warn(`Lightsail instance ${config.name} was created but could not be read back`);
    return;
  }

  store.put(INSTANCE_RESOURCE_TYPE, result.id, config, result.attributes);
  await store.save();
  spinner.succeed(`Created Lightsail instance ${chalk.cyan(result.id)}`);
  printAttributes(result.attributes);
}

export async function instanceCreate(options: ResourceCommandOptions): Promise<void> {
  const context = await createContext(options);
  const config = parseInstanceConfig(await readDesiredConfig(options));

  if (context.store.get(INSTANCE_RESOURCE_TYPE, config.name)) {
    throw new Error(
      `Lightsail instance ${config.name} is already tracked, use 'skyform instance update'`
    );
  }

  await createTracked(context, config);
}

export async function instanceRead(name: string, options: GlobalOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);
  const result = await withSpinner(spinner, `Reading Lightsail instance ${name}`, () =>
    instances.read(name, meta)
  );

  if (!result.found) {
    store.remove(INSTANCE_RESOURCE_TYPE, name);
    await store.save();
    spinner.warn(`Lightsail instance ${name} not found, removed from state`);
    return;
  }

  const tracked = store.get(INSTANCE_RESOURCE_TYPE, name);
  if (tracked) {
    store.put(INSTANCE_RESOURCE_TYPE, name, tracked.config, result.attributes);
    await store.save();
  }
  spinner.succeed(`Lightsail instance ${chalk.cyan(name)}`);
  printAttributes(result.attributes);
}

export async function instanceUpdate(name: string, options: ResourceCommandOptions): Promise<void> {
  const context = await createContext(options);
  const { meta, store, spinner } = context;

  const tracked = store.get(INSTANCE_RESOURCE_TYPE, name);
  if (!tracked) {
    throw new Error(`Lightsail instance ${name} is not tracked, use 'skyform instance import'`);
  }
  const desired = parseInstanceConfig(await readDesiredConfig(options));

  const current = await withSpinner(spinner, `Refreshing Lightsail instance ${name}`, () =>
    instances.read(name, meta)
  );
  if (!current.found) {
    store.remove(INSTANCE_RESOURCE_TYPE, name);
    await store.save();
    spinner.fail(`Lightsail instance ${name} no longer exists, removed from state`);
    throw new NotFoundError(`Lightsail Instance (${name}) not found`);
  }

  const prior = refreshInstanceConfig(parseInstanceConfig(tracked.config), current.attributes);
  const plan = planInstanceChange(prior, desired);

  switch (plan.action) {
    case "noop":
      spinner.succeed(`Lightsail instance ${chalk.cyan(name)} is up to date`);
      return;

    case "replace":
      spinner.info(`Replacing Lightsail instance ${name} (changed: ${plan.changed.join(", ")})`);
      await withSpinner(spinner, `Deleting Lightsail instance ${name}`, () =>
        instances.delete(name, meta)
      );
      store.remove(INSTANCE_RESOURCE_TYPE, name);
      await store.save();
      await createTracked(context, desired);
      return;

    case "update": {
      const result = await withSpinner(
        spinner,
        `Updating Lightsail instance ${name} (${plan.changed.join(", ")})`,
        () => instances.update(name, prior, desired, meta)
      );
      const attributes: InstanceAttributes | undefined = result.found ? result.attributes : undefined;
      store.put(INSTANCE_RESOURCE_TYPE, name, desired, attributes ?? current.attributes);
      await store.save();
      spinner.succeed(`Updated Lightsail instance ${chalk.cyan(name)}`);
      if (attributes) printAttributes(attributes);
      return;
    }
  }
}

export async function instanceDelete(name: string, options: GlobalOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);

  await withSpinner(spinner, `Deleting Lightsail instance ${name}`, () =>
    instances.delete(name, meta)
  );
  store.remove(INSTANCE_RESOURCE_TYPE, name);
  await store.save();
  spinner.succeed(`Deleted Lightsail instance ${chalk.cyan(name)}`);
}

export async function instanceImport(name: string, options: GlobalOptions): Promise<void> {
  const { meta, store, spinner } = await createContext(options);

  const result = await withSpinner(spinner, `Importing Lightsail instance ${name}`, () =>
    instances.importState(name, meta)
  );
  if (!result.found) {
    spinner.fail(`Lightsail instance ${name} not found`);
    throw new NotFoundError(`Lightsail Instance (${name}) not found`);
  }

  const { attributes } = result;
  const config = parseInstanceConfig({
    name: attributes.name,
    availability_zone: attributes.availability_zone,
    blueprint_id: attributes.blueprint_id,
    bundle_id: attributes.bundle_id,
    key_pair_name: attributes.key_pair_name,
    ip_address_type: attributes.ip_address_type,
    tags: attributes.tags,
  });

  store.put(INSTANCE_RESOURCE_TYPE, name, config, attributes);
  await store.save();
  spinner.succeed(`Imported Lightsail instance ${chalk.cyan(name)}`);
  printAttributes(attributes);
}
