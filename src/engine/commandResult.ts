export type CommandResult = { ok: true; message: string } | { ok: false; error: string };

export const succeed = (message: string): CommandResult => ({ ok: true, message });

export const fail = (error: string): CommandResult => ({ ok: false, error });

/** Flattens a result into the short line a caller shows next to the command. */
export const describeCommandResult = (result: CommandResult): string => (result.ok ? result.message : result.error);
