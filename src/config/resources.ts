import { fileURLToPath } from 'node:url';
import * as path from 'node:path';

/** Bundled resources ship beside `src/` (and `dist/`). */
export const RESOURCES_DIR = fileURLToPath(new URL('../../resources/', import.meta.url));

export const BUNDLED_HK_PACKETS_FILE = path.join(RESOURCES_DIR, 'hk-packets.json');
export const BUNDLED_SPICE_KERNELS_FILE = path.join(RESOURCES_DIR, 'spice-kernels.json');
export const FILES_SCHEMA_SQL_FILE = path.join(RESOURCES_DIR, 'sql', '001_create_files.sql');
