import { readFileSync } from 'fs';
import { z } from 'zod';

const PackageSchema = z.object({ version: z.string() });

// Same relative path from src/ and dist/
const pkg = PackageSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

export const VERSION: string = pkg.version;
