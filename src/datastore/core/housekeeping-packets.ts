/**
 * Housekeeping packet table.
 *
 * The closed set of (APID, packet name, subsystem) triples the pipeline knows.
 * It is loaded once from configuration; the housekeeping recognizers derive
 * their allowed descriptor families from it.
 */

export interface HousekeepingPacket {
  readonly apid: number;
  readonly packet: string;
  readonly subsystem: string;
}

export interface HousekeepingPacketTable {
  readonly packets: readonly HousekeepingPacket[];
  /** Descriptor families, e.g. `hsk`, `ehs`. */
  readonly families: ReadonlySet<string>;
  findByApid(apid: number): HousekeepingPacket | undefined;
  findByName(packet: string): HousekeepingPacket | undefined;
  isKnownDescriptor(descriptor: string): boolean;
}

/**
 * Packet name to datastore descriptor.
 *
 *   MAG_HSK_PW -> mag_hsk_pw -> mag-hsk-pw -> hsk-pw
 */
export function packetToDescriptor(packet: string): string {
  const normalized = packet.toLowerCase().replace(/_/g, '-');
  const separator = normalized.indexOf('-');
  return separator === -1 ? '' : normalized.slice(separator + 1);
}

/** `hsk-pw` -> `hsk` */
export function descriptorFamily(descriptor: string): string {
  const separator = descriptor.indexOf('-');
  return separator === -1 ? descriptor : descriptor.slice(0, separator);
}

export function createHousekeepingPacketTable(packets: readonly HousekeepingPacket[]): HousekeepingPacketTable {
  const byApid = new Map(packets.map((p) => [p.apid, p] as const));
  const byName = new Map(packets.map((p) => [p.packet, p] as const));
  const families = new Set(
    packets
      .map((p) => descriptorFamily(packetToDescriptor(p.packet)))
      .filter((family) => family.length > 0)
  );

  return {
    packets,
    families,
    findByApid: (apid) => byApid.get(apid),
    findByName: (packet) => byName.get(packet),
    isKnownDescriptor: (descriptor) => descriptor.includes('-') && families.has(descriptorFamily(descriptor)),
  };
}
