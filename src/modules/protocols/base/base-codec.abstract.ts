import { Logger } from '../../../utils/logger';
import { checksumWidth } from '../gt06/gt06.codec';
import { DEFAULT_WIRE_PROFILE, WireProfile } from '../gt06/gt06.types';

export abstract class BaseCodec {
  protected logger: Logger;
  abstract readonly protocolName: string;
  protected readonly profile: Readonly<WireProfile>;

  constructor(profile: Partial<WireProfile> = {}) {
    this.logger = new Logger(`${this.constructor.name}`);
    this.profile = { ...DEFAULT_WIRE_PROFILE, ...profile };
  }

  get wireProfile(): Readonly<WireProfile> {
    return this.profile;
  }

  /**
   * Width of the error check field for the active profile (1 = XOR, 2 = CRC16/X25)
   */
  protected get checksumWidth(): 1 | 2 {
    return checksumWidth(this.profile.checksum);
  }
}
