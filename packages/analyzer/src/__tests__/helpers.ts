import { readFileSync } from 'fs';
import path from 'path';

export const FIXTURE_DIR = path.join(__dirname, 'fixtures');

export const fixturePath = (name: string): string => path.join(FIXTURE_DIR, name);

export const readFixture = (name: string): string => readFileSync(fixturePath(name), 'utf8');
