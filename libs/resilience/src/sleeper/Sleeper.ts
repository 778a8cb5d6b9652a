import { setTimeout } from 'timers/promises';
import { Injectable } from '@nestjs/common';

export abstract class Sleeper {
  abstract sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

@Injectable()
export class TimerSleeper extends Sleeper {
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await setTimeout(ms, undefined, { signal });
  }
}
