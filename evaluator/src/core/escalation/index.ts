/**
 * 교전 정책 모듈 - 진입점
 */

export * from './escalationPolicy';
