export type ArgValue = string | boolean;

export interface ParsedCliArgs {
	command?: string;
	flags: Record<string, ArgValue>;
}

export const parseCliArgs = (argv: string[]): ParsedCliArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next !== undefined && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	if (positionals[1] && flags.symbol === undefined) {
		flags.symbol = positionals[1];
	}
	return { command: positionals[0], flags };
};

export const readStringFlag = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};
