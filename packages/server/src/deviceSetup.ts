import { createModuleLogger, decodeDevicePayload } from 'tuya-telemetry-core';
import type { Device, DeviceEntry, TelemetryApi } from 'tuya-telemetry-core';

const logger = createModuleLogger('DeviceSetup');

interface ResolvedDevice {
  device: Device;
  configured: boolean;
}

/**
 * @hebrew קובע שם תצוגה לכל התקן בתצורה, לפני בניית ה-DeviceRegistry.
 * רשומה בלי שם מקבלת את השם שמדווח בענן; אם השליפה נכשלת, המזהה משמש כשם.
 * שם מהענן שמשותף לכמה התקנים מקבל את המזהה בסוגריים, כי השם הוא תווית ה-device.
 */
export async function resolveDevices(entries: DeviceEntry[], api: Pick<TelemetryApi, 'getDevice'>): Promise<Device[]> {
  const resolved = await Promise.all(entries.map(async ({ id, name }): Promise<ResolvedDevice> => {
    if (name) {
      return { device: { id, name }, configured: true };
    }
    try {
      const decoded = decodeDevicePayload(await api.getDevice(id), id);
      if (decoded.name) {
        logger.info(`Device ${id} is named "${decoded.name}" in the cloud`);
        return { device: { id, name: decoded.name }, configured: false };
      }
      logger.warn(`Device ${id} has no name in the cloud, using its id`);
    } catch (error) {
      logger.warn(`Could not look up the name of device ${id}, using its id`, { error });
    }
    return { device: { id, name: id }, configured: false };
  }));

  const nameCounts = new Map<string, number>();
  for (const { device } of resolved) {
    nameCounts.set(device.name, (nameCounts.get(device.name) ?? 0) + 1);
  }

  return resolved.map(({ device, configured }) => {
    if (configured || (nameCounts.get(device.name) ?? 0) < 2) {
      return device;
    }
    const name = `${device.name} (${device.id})`;
    logger.warn(`Device name "${device.name}" is shared by several devices, labelling ${device.id} as "${name}"`);
    return { id: device.id, name };
  });
}
