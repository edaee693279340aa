export { CommandRegistry, parseCommand } from './registry.ts';
export type { CommandHandler, CommandHandlerClass, ParsedCommand } from './registry.ts';
export { parseArguments } from './arguments.ts';
export { scanCommandDir, loadCommands, capitalizeFirst, qualifiedName } from './loader.ts';
export type { CommandEntry, LoadCommandsOptions, ModuleImporter } from './loader.ts';
export { renderRegistrationModule, writeRegistrationModule } from './codegen.ts';
