import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

export { createScriptedOracle, type ScriptedOracle, type ScriptedReply } from './oracle.js';

export const JOB_BOARD_FIXTURE_ID = 'job-board' as const;

export interface JobBoardFixture {
  readonly id: typeof JOB_BOARD_FIXTURE_ID;
  readonly paths: {
    readonly html: string;
  };
  readonly html: string;
  readonly expected: {
    readonly containerSelector: string;
    readonly itemSelector: string;
    readonly titles: readonly string[];
  };
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');

const JOB_BOARD_TITLES = [
  'Backend Engineer',
  'Frontend Developer',
  'Data Analyst',
  'Site Reliability Engineer',
  'Product Designer',
  'QA Engineer'
] as const;

let cachedFixture: JobBoardFixture | undefined;

export const loadJobBoardFixture = (): JobBoardFixture => {
  if (cachedFixture) {
    return cachedFixture;
  }

  const htmlPath = join(FIXTURE_ROOT, 'job-board.html');
  cachedFixture = Object.freeze({
    id: JOB_BOARD_FIXTURE_ID,
    paths: { html: htmlPath },
    html: readFileSync(htmlPath, 'utf-8'),
    expected: {
      containerSelector: 'section.job-list',
      itemSelector: 'article.job-card',
      titles: JOB_BOARD_TITLES
    }
  });
  return cachedFixture;
};

export const getJobBoardAssetPath = (): string => loadJobBoardFixture().paths.html;
