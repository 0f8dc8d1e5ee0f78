/**
 * FlagRegistry view over a commander Command.
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import type { FlagInfo, FlagRegistry, FlagVisitor } from './types.js';

const TRUE_STRINGS = ['1', 't', 'T', 'TRUE', 'true', 'True'];
const FALSE_STRINGS = ['0', 'f', 'F', 'FALSE', 'false', 'False'];

export function parseBooleanFlag(value: string): boolean {
    if (TRUE_STRINGS.includes(value)) return true;
    if (FALSE_STRINGS.includes(value)) return false;
    throw new InvalidArgumentError(`invalid boolean value "${value}"`);
}

/** A switch takes no argument on the command line: `--verbose`, `--no-color`. */
function isSwitch(option: Option): boolean {
    return !option.required && !option.optional;
}

function renderValue(value: unknown): string {
    return value === undefined || value === null ? '' : String(value);
}

/**
 * Exposes the options of a commander Command as flags.
 *
 * The version option added by `.version()` is an action, not a setting, and
 * is left out when it is spelled `--version`. Custom flags given to
 * `.version()` are treated as ordinary switches.
 *
 * `--color` and `--no-color` are two flags writing the same attribute. When
 * both `PREFIX_COLOR` and `PREFIX_NO_COLOR` are set, the one applied last
 * wins.
 */
export class CommandFlagRegistry implements FlagRegistry {
    constructor(private readonly command: Command) { }

    public visitAll(fn: FlagVisitor): void {
        for (const option of this.settings()) {
            fn(this.toFlagInfo(option));
        }
    }

    public visit(fn: FlagVisitor): void {
        for (const option of this.settings()) {
            if (this.isExplicitlySet(option)) {
                fn(this.toFlagInfo(option));
            }
        }
    }

    public set(name: string, value: string): void {
        const option = this.settings().find(o => o.name() === name);
        if (!option) {
            throw new Error(`unknown flag: ${name}`);
        }

        this.command.setOptionValueWithSource(
            option.attributeName(),
            this.convert(option, value),
            'env'
        );
    }

    private settings(): Option[] {
        const hasVersion = this.command.version() !== undefined;
        return this.command.options.filter(o => !(hasVersion && o.attributeName() === 'version'));
    }

    /**
     * Commander records where each option value came from. Anything other
     * than the declared default was put there on purpose.
     */
    private isExplicitlySet(option: Option): boolean {
        const source = this.command.getOptionValueSource(option.attributeName());
        return source !== undefined && source !== 'default';
    }

    private convert(option: Option, value: string): unknown {
        if (option.parseArg) {
            const previous: unknown = this.command.getOptionValue(option.attributeName());
            return option.parseArg(value, previous);
        }

        if (isSwitch(option)) {
            const enabled = parseBooleanFlag(value);
            return option.negate ? !enabled : enabled;
        }

        if (option.variadic) {
            return [value];
        }

        return value;
    }

    private toFlagInfo(option: Option): FlagInfo {
        return {
            name: option.name(),
            value: renderValue(this.command.getOptionValue(option.attributeName())),
            usage: option.description
        };
    }
}

export function commandRegistry(command: Command): FlagRegistry {
    return new CommandFlagRegistry(command);
}
