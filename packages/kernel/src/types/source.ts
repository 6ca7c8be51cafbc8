/**
 * Respack Kernel — Pack Source Interface
 *
 * A pack source enumerates the raw pack registrations the host knows
 * about. It is the only discovery I/O in the system; implementations live
 * in the runtime host and are injected into the registry.
 *
 * A registration is deliberately unloaded: sources report what exists,
 * and the loader decides what is usable. Loading is deferred to `load()`
 * so one broken registration never prevents enumerating the rest.
 */

/**
 * One pack registration as the host reports it.
 */
export interface RawPackRegistration {
  /**
   * Name of the installable unit that declared the pack.
   * Undefined when the host cannot report it; the loader substitutes
   * UNKNOWN_DIST_NAME.
   */
  readonly dist_name: string | undefined;
  /** Pack name, unique within the distribution. */
  readonly pack_name: string;
  /**
   * Load the pack factory. May reject (missing module, syntax error, ...).
   * The value is not trusted: the loader checks it is callable.
   */
  load(): Promise<unknown>;
}

/**
 * Enumerates pack registrations from the host environment.
 */
export interface PackSource {
  enumerate(): Promise<ReadonlyArray<RawPackRegistration>>;
}

/** Distribution name used when the host cannot report one. */
export const UNKNOWN_DIST_NAME = 'unknown';
