import type { ProtocolAdapter } from './ProtocolAdapter';
import { variantKey, type ProtocolParameters, type ProtocolVariant } from './variants';
import { createDkgAdapter } from '../dkg/DkgAdapter';
import { ConfigurationError } from '../../utils/errors';

export type AdapterFactory = (variant: ProtocolVariant, parameters: ProtocolParameters) => ProtocolAdapter<unknown>;

/**
 * Maps each protocol variant to the factory of its adapter. A session picks
 * its adapter here once, at construction.
 */
export class ProtocolRegistry {
  private factories: Map<string, AdapterFactory> = new Map();

  /** Registry carrying the built-in Feldman VSS key generation for both families */
  static withDefaults(): ProtocolRegistry {
    return new ProtocolRegistry()
      .register({ family: 'gg20', kind: 'keygen' }, createDkgAdapter)
      .register({ family: 'cggmp', kind: 'keygen' }, createDkgAdapter);
  }

  register(variant: ProtocolVariant, factory: AdapterFactory): this {
    this.factories.set(variantKey(variant), factory);
    return this;
  }

  create(variant: ProtocolVariant, parameters: ProtocolParameters): ProtocolAdapter<unknown> {
    const factory = this.factories.get(variantKey(variant));
    if (!factory) {
      throw new ConfigurationError(`No protocol adapter registered for ${variantKey(variant)}`);
    }
    return factory(variant, parameters);
  }
}
