/**
 * 위협 평가 루프 모듈 - 진입점
 */

export * from './deadBand';
export * from './scheduler';
export * from './trackValidation';
export * from './threatEvaluator';
