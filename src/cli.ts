/**
 * 명령줄 진입점
 *
 * @example
 * npm start -- --input data/atussum.csv --method sql --format csv
 */

import { parseArgs } from 'util';
import { loadJobConfig } from './config/JobConfig';
import { runTimeUsageJob } from './processor/TimeUsageJob';
import { TimeUsageError } from './core/errors';
import { logger } from './utils/logger';

const USAGE = `Usage: time-usage [options]

Options:
  --input <path>               survey CSV (default: data/atussum.csv)
  --method <name>              expression | sql | typed (default: expression)
  --format <name>              markdown | csv | json (default: markdown)
  --max-employment-code <n>    highest admitted employment status code (default: 4)
  --debug                      record per-phase timings
  --help                       show this message
`;

/**
 * 인자 파싱 + 작업 실행
 *
 * @returns 프로세스 종료 코드
 */
export async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: 'string' },
      method: { type: 'string' },
      format: { type: 'string' },
      'max-employment-code': { type: 'string' },
      debug: { type: 'boolean' },
      help: { type: 'boolean' },
    },
  });

  if (values.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  try {
    const config = loadJobConfig({
      input: values.input,
      method: values.method,
      format: values.format,
      maxEmploymentCode: values['max-employment-code'],
      debug: values.debug,
    });
    await runTimeUsageJob(config);
    return 0;
  } catch (err) {
    if (err instanceof TimeUsageError) {
      logger.error({ code: err.code, err }, err.message);
      return 1;
    }
    logger.fatal({ err }, 'Unexpected failure');
    return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // 인자 파싱 오류 (알 수 없는 옵션 등)
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    process.exitCode = 1;
  }
);
