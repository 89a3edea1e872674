/** Maze Chase 기본 에러 */
export class MazeChaseError extends Error {
  readonly code: string;

  constructor(message: string, code = 'MAZE_CHASE_ERROR') {
    super(message);
    this.name = 'MazeChaseError';
    this.code = code;
  }
}

/** 허용되지 않은 방향 입력 */
export class InvalidDirectionError extends MazeChaseError {
  readonly received: unknown;

  constructor(received: unknown) {
    super(
      `Invalid direction: ${typeof received === 'string' ? `"${received}"` : String(received)}`,
      'INVALID_DIRECTION',
    );
    this.name = 'InvalidDirectionError';
    this.received = received;
  }
}

/** 미로 정의 오류 */
export class InvalidLayoutError extends MazeChaseError {
  constructor(message: string) {
    super(message, 'INVALID_LAYOUT');
    this.name = 'InvalidLayoutError';
  }
}

/** 게임 설정 또는 환경 변수 검증 실패 */
export class InvalidConfigError extends MazeChaseError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

/** 세션을 찾을 수 없음 */
export class SessionNotFoundError extends MazeChaseError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}
