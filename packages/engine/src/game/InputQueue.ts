import type { Direction } from '@maze-chase/shared';
import { DirectionSchema, InvalidDirectionError } from '@maze-chase/shared';

/**
 * 최신 입력 버퍼 (last-write-wins)
 * 입력 백엔드는 언제든 `push`하고, 시뮬레이션은 틱마다 한 번 `take`한다.
 */
export class InputQueue {
  private latest: Direction | null = null;

  /**
   * 방향 의도 기록
   * @throws InvalidDirectionError 5종 방향 외의 값 (버퍼는 변경되지 않음)
   */
  push(raw: unknown): Direction {
    const parsed = DirectionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidDirectionError(raw);
    }
    this.latest = parsed.data;
    return parsed.data;
  }

  /** 최신 의도를 꺼내고 비운다 */
  take(): Direction | null {
    const intent = this.latest;
    this.latest = null;
    return intent;
  }

  peek(): Direction | null {
    return this.latest;
  }

  clear(): void {
    this.latest = null;
  }
}
