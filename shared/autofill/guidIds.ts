import { invariant } from '../errors';

const HALF_BITS = 16;
const HALF_MASK = 0xffff;

/** Unique id carried by rows that do not refer to a stored record. */
export const INVALID_UNIQUE_ID = -1;

export interface UnpackedGuids {
  cardGuid: string;
  profileGuid: string;
}

/**
 * Maps record GUIDs to small integers so that only packed ids ever leave the
 * process. Ids are assigned from 1 upwards and never reused; 0 stands for
 * "no record". One table lives as long as the session that owns it.
 */
export class GuidIdTable {
  private readonly guidToIdMap = new Map<string, number>();
  private readonly idToGuidMap = new Map<number, string>();
  private nextId = 1;

  get size(): number {
    return this.guidToIdMap.size;
  }

  guidToId(guid: string): number {
    if (!guid) {
      return 0;
    }
    const existing = this.guidToIdMap.get(guid);
    if (existing !== undefined) {
      return existing;
    }
    invariant(this.nextId <= HALF_MASK, `Unique id space exhausted after ${HALF_MASK} identifiers`);
    const id = this.nextId;
    this.nextId += 1;
    this.guidToIdMap.set(guid, id);
    this.idToGuidMap.set(id, guid);
    return id;
  }

  idToGuid(id: number): string {
    if (id === 0) {
      return '';
    }
    const guid = this.idToGuidMap.get(id);
    invariant(guid !== undefined, `Unique id ${id} was not issued by this session`);
    return guid;
  }

  /** Card id in the high 16 bits, profile id in the low 16 bits. */
  pack(cardGuid: string, profileGuid: string): number {
    invariant(!(cardGuid && profileGuid), 'A suggestion cannot refer to both a payment card and a profile');
    const cardId = this.guidToId(cardGuid);
    const profileId = this.guidToId(profileGuid);
    return (cardId << HALF_BITS) | profileId;
  }

  unpack(id: number): UnpackedGuids {
    const cardId = (id >>> HALF_BITS) & HALF_MASK;
    const profileId = id & HALF_MASK;
    return {
      cardGuid: this.idToGuid(cardId),
      profileGuid: this.idToGuid(profileId),
    };
  }
}
