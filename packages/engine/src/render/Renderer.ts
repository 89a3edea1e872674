import type { RenderSnapshot } from '@maze-chase/shared';

/**
 * 렌더러 협력자
 * 프레임마다 스냅샷을 한 번 받으며 코어 상태를 변경하지 않는다.
 */
export interface Renderer {
  render(snapshot: RenderSnapshot): void;
}
