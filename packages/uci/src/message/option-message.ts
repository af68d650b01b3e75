/**
 * Kinds of engine-tunable settings
 */
export type OptionType = 'check' | 'spin' | 'combo' | 'button' | 'string';

/**
 * Descriptor of an engine option, as announced after `uci`
 *
 * Which fields are rendered depends on `type`: spin uses min/max, combo
 * uses vars, and button has no default.
 */
export interface OptionMsg {
  readonly id: string;
  readonly type: OptionType;
  readonly default: string;
  /** Spin bounds; values beyond 2^53 lose precision as numbers */
  readonly min: number;
  readonly max: number;
  readonly vars: readonly string[];
}

const EMPTY_OPTION = { default: '', min: 0, max: 0, vars: [] } as const;

/** Create a `check` option with a boolean default */
export function createCheckOption(id: string, defaultValue: boolean): OptionMsg {
  return { ...EMPTY_OPTION, id, type: 'check', default: String(defaultValue) };
}

/** Create a `spin` option with an integer range */
export function createSpinOption(
  id: string,
  defaultValue: string,
  min: number,
  max: number,
): OptionMsg {
  return { ...EMPTY_OPTION, id, type: 'spin', default: defaultValue, min, max };
}

/** Create a `combo` option with its allowed values */
export function createComboOption(
  id: string,
  defaultValue: string,
  vars: readonly string[],
): OptionMsg {
  return { ...EMPTY_OPTION, id, type: 'combo', default: defaultValue, vars: [...vars] };
}

/** Create a `button` option */
export function createButtonOption(id: string): OptionMsg {
  return { ...EMPTY_OPTION, id, type: 'button' };
}

/** Create a `string` option */
export function createStringOption(id: string, defaultValue: string): OptionMsg {
  return { ...EMPTY_OPTION, id, type: 'string', default: defaultValue };
}

/**
 * Build an `option` message
 *
 * @example
 * buildOptionMsg(createSpinOption('Hash', '16', 1, 1024));
 * // => 'option name Hash type spin default 16 min 1 max 1024'
 */
export function buildOptionMsg(option: OptionMsg): string {
  let msg = `option name ${option.id} type ${option.type}`;

  if (option.type !== 'button') {
    msg += ` default ${option.default}`;
  }

  if (option.type === 'spin' && option.min !== option.max) {
    msg += ` min ${option.min} max ${option.max}`;
  }

  if (option.type === 'combo' && option.vars.length > 0) {
    msg += ` var ${option.vars.join(' ')}`;
  }

  return msg;
}
