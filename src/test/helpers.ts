import fs from 'fs';
import os from 'os';
import path from 'path';
import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';

/** A 200 response carrying `data`, shaped like what axios resolves with. */
export function axiosResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

/** Fresh temporary directory for one test. */
export function makeTempDir(prefix = 'narration-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
