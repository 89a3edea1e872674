/** 이동 방향 (stop 포함 5종) */
export type Direction = 'up' | 'down' | 'left' | 'right' | 'stop';

/** 실제 이동이 일어나는 4방향 */
export type MoveDirection = Exclude<Direction, 'stop'>;

/** 미로 셀 좌표 (열, 행) */
export interface Cell {
  readonly col: number;
  readonly row: number;
}

/** 월드 좌표 (픽셀 단위, 실수) */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** 펠릿 소비 결과 종류 */
export type ConsumableKind = 'pellet' | 'power' | 'none';

/** 펠릿 소비 결과 */
export interface ConsumeResult {
  readonly kind: ConsumableKind;
  readonly points: number;
}

/** 적 상태 */
export type AdversaryMode = 'normal' | 'frightened' | 'dead';

/** 적 스폰 정의 */
export interface AdversarySpawn {
  readonly id: string;
  readonly cell: Cell;
  readonly color: string;
}

/**
 * 미로 정의
 * `#` 벽, `.` 펠릿, `o` 파워 펠릿, 공백은 빈 바닥
 */
export interface MazeDefinition {
  readonly rows: readonly string[];
  readonly playerSpawn: Cell;
  readonly adversaries: readonly AdversarySpawn[];
}

/** 플레이어 렌더 상태 */
export interface PlayerView {
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly color: string;
  readonly direction: Direction;
}

/** 적 렌더 상태 */
export interface AdversaryView {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly radius: number;
  readonly color: string;
  readonly direction: Direction;
  readonly mode: AdversaryMode;
  readonly respawnCell: Cell;
}

/**
 * 렌더러에 전달되는 읽기 전용 스냅샷
 * 렌더러는 이 값으로 프레임을 그리며 코어 상태를 변경하지 않는다.
 */
export interface RenderSnapshot {
  readonly tick: number;
  readonly width: number;
  readonly height: number;
  readonly tileSize: number;
  readonly walls: readonly (readonly boolean[])[];
  readonly pellets: readonly Cell[];
  readonly powerPellets: readonly Cell[];
  readonly player: PlayerView;
  readonly adversaries: readonly AdversaryView[];
  readonly score: number;
  readonly lives: number;
  readonly powerActive: boolean;
  readonly powerRemainingMs: number;
  readonly win: boolean;
  readonly gameOver: boolean;
}
