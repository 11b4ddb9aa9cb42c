import { Command, type OutputConfiguration } from "commander";
import { instanceCreate, instanceDelete, instanceImport, instanceRead, instanceUpdate } from "./commands/instance";
import { attachmentCreate, attachmentDelete, attachmentRead } from "./commands/attachment";
import { SKYFORM_VERSION } from "./version";

function withGlobalOptions(command: Command): Command {
  return command
    .option("-s, --state <path>", "State file", "skyform.state.json")
    .option("-p, --provider-config <path>", "Provider settings file (default: ./skyform.config.json)")
    .option("-v, --verbose", "Print debug output");
}

/**
 * Build the skyform command tree. Parse errors reject instead of exiting.
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  program
    .name("skyform")
    .description("Skyform CLI - manage Lightsail instances and load balancer attachments")
    .version(SKYFORM_VERSION)
    // Inherited by subcommands created below
    .exitOverride();
  if (output) program.configureOutput(output);

  // Instances
  const instance = program
    .command("instance")
    .description("Lightsail instance lifecycle");

  withGlobalOptions(instance.command("create"))
    .description("Create an instance from a configuration file")
    .requiredOption("-c, --config <path>", "Instance configuration (JSON)")
    .action(instanceCreate);

  withGlobalOptions(instance.command("read <name>"))
    .description("Read an instance and refresh its tracked state")
    .action(instanceRead);

  withGlobalOptions(instance.command("update <name>"))
    .description("Apply a changed configuration, replacing the instance when needed")
    .requiredOption("-c, --config <path>", "Instance configuration (JSON)")
    .action(instanceUpdate);

  withGlobalOptions(instance.command("delete <name>"))
    .description("Delete an instance")
    .action(instanceDelete);

  withGlobalOptions(instance.command("import <name>"))
    .description("Start tracking an existing instance")
    .action(instanceImport);

  // Load balancer attachments
  const attachment = program
    .command("attachment")
    .description("Lightsail load balancer attachment lifecycle");

  withGlobalOptions(attachment.command("create"))
    .description("Attach an instance to a load balancer")
    .requiredOption("-c, --config <path>", "Attachment configuration (JSON)")
    .action(attachmentCreate);

  withGlobalOptions(attachment.command("read <id>"))
    .description("Read an attachment by LB_NAME,INSTANCE_NAME")
    .action(attachmentRead);

  withGlobalOptions(attachment.command("delete <id>"))
    .description("Detach an instance from a load balancer")
    .action(attachmentDelete);

  return program;
}
