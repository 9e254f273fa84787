import type { Device } from './types';

/**
 * @hebrew רשומת התקן כפי שהיא מופיעה בתצורה, לפני שנקבע לה שם תצוגה.
 */
export interface DeviceEntry {
  id: string;
  name?: string;
}

/**
 * @hebrew מפענח את ערך התצורה של מזהי ההתקנים.
 * הפורמט: רשימה מופרדת בפסיקים של `id` או `id=שם תצוגה`.
 * @example parseDeviceList('bf01a2,bf77c3=Living room')
 */
export function parseDeviceList(raw: string): DeviceEntry[] {
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const separatorIndex = part.indexOf('=');
      if (separatorIndex === -1) {
        return { id: part };
      }
      const id = part.substring(0, separatorIndex).trim();
      const name = part.substring(separatorIndex + 1).trim();
      return name ? { id, name } : { id };
    });
}

/**
 * @hebrew מיפוי קבוע ממזהה התקן לשם התצוגה שלו, נבנה פעם אחת בעליית התהליך.
 */
export class DeviceRegistry {
  private readonly devices: readonly Device[];
  private readonly byId: ReadonlyMap<string, Device>;

  constructor(devices: Iterable<Device>) {
    const list: Device[] = [];
    const byId = new Map<string, Device>();
    // השם הוא תווית ה-device של כל הסדרות, ולכן גם הוא חייב להיות ייחודי
    const names = new Set<string>();

    for (const { id, name } of devices) {
      if (!id) {
        throw new Error('Device id must not be empty');
      }
      if (byId.has(id)) {
        throw new Error(`Duplicate device id: ${id}`);
      }
      const device: Device = Object.freeze({ id, name: name || id });
      if (names.has(device.name)) {
        throw new Error(`Duplicate device name: ${device.name}`);
      }
      names.add(device.name);
      list.push(device);
      byId.set(id, device);
    }

    if (list.length === 0) {
      throw new Error('At least one device must be registered');
    }

    this.devices = Object.freeze(list);
    this.byId = byId;
  }

  public list(): readonly Device[] {
    return this.devices;
  }

  public get(id: string): Device | undefined {
    return this.byId.get(id);
  }

  public has(id: string): boolean {
    return this.byId.has(id);
  }

  public get size(): number {
    return this.devices.length;
  }
}
