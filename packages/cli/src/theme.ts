import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface Theme {
  readonly heading: ChalkInstance
  readonly name:    ChalkInstance
  readonly pack:    ChalkInstance
  readonly label:   ChalkInstance
  readonly muted:   ChalkInstance
  readonly accent:  ChalkInstance
  readonly error:   ChalkInstance
}

const plain = new Chalk({ level: 0 })

/**
 * Colour palette for human-readable output. With color off every style
 * is the identity, so tests and pipes see plain text.
 */
export function createTheme(color: boolean): Theme {
  const c = color ? chalk : plain
  return {
    heading: c.hex('#F2F2EC').bold,
    name:    c.hex('#F2F2EC'),
    pack:    c.hex('#4FC3F7'),
    label:   c.hex('#666666'),
    muted:   c.hex('#444444'),
    accent:  c.hex('#D4880A'),
    error:   c.hex('#CF6679'),
  }
}

/** Whether the default chalk instance detected a colour-capable stdout. */
export const colorSupported = chalk.level > 0
