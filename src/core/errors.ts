/**
 * completion provider 호출 실패를 나타내는 오류.
 * - 네트워크 오류, 인증/쿼터 실패, 비정상 응답 모두 여기에 해당한다.
 */
export class ProviderError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProviderError";
    this.status = options?.status;
  }
}

/**
 * provider가 설정값(모델 식별자, provider 종류)을 거부한 경우.
 */
export class ConfigurationError extends ProviderError {
  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
