import fs from 'fs';
import path from 'path';
import { _dataRoot$, configStore$ } from './state';

const LOG_FILE = 'pikabook-log';

const format = (content: unknown[]) => content
  .map((s) => {
    if (s instanceof Error) {
      return s.stack ?? s.message;
    }
    if (typeof s === 'object') {
      return JSON.stringify(s, null, 2);
    }
    return String(s);
  })
  .join(' ');

export const logToFile = (...content: unknown[]) => {
  const dataRoot = _dataRoot$.getValue();
  if (dataRoot !== '' && configStore$.getValue().logToFile) {
    try {
      fs.appendFileSync(path.join(dataRoot, LOG_FILE), `${format(content)}\n`);
    } catch (e) {
      console.log('write log file failed:', e);
    }
  }
  console.log(...content);
};
