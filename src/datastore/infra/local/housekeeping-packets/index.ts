import { z } from 'zod';
import type { ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../../../ports/fs.port.js';
import type { HousekeepingPacketTable } from '../../../core/housekeeping-packets.js';
import { createHousekeepingPacketTable } from '../../../core/housekeeping-packets.js';
import type { ReferenceTableError } from '../reference-table/index.js';
import { readJsonTable } from '../reference-table/index.js';

const PacketSchema = z.object({
  apid: z.number().int().nonnegative(),
  packet: z.string().regex(/^[A-Z0-9]+(?:_[A-Z0-9]+)+$/, 'Packet names are upper-case words joined by `_`'),
  subsystem: z.string().min(1),
});

const PacketTableFileSchema = z
  .object({ packets: z.array(PacketSchema).min(1) })
  .superRefine((file, ctx) => {
    const seen = new Set<number>();
    file.packets.forEach((p, i) => {
      if (seen.has(p.apid)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['packets', i, 'apid'], message: `Duplicate APID ${p.apid}` });
      }
      seen.add(p.apid);
    });
  });

export function loadHousekeepingPacketTable(
  fs: FileReadPort,
  filePath: string
): ResultAsync<HousekeepingPacketTable, ReferenceTableError> {
  return readJsonTable(fs, filePath, PacketTableFileSchema).map((file) => createHousekeepingPacketTable(file.packets));
}
