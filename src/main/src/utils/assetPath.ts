import PATH from 'path';
import { existsSync } from 'fs';

// sources run from src/main/src/utils, the build from dist/src/main/src/utils
const CANDIDATES = [PATH.join(__dirname, '../../../../assets'), PATH.join(__dirname, '../../../../../assets')];

const RESOURCES_PATH = CANDIDATES.find((candidate) => existsSync(candidate)) ?? CANDIDATES[0];

export const getAssetPath = (...paths: string[]): string => {
  return PATH.join(RESOURCES_PATH, ...paths);
};
