//
//
//

import { Duration } from './time';

export function sleep(duration: Duration): Promise<void> {
  // eslint-disable-next-line no-promise-executor-return
  return new Promise((resolve) => setTimeout(resolve, duration.milliseconds));
}
