/**
 * 위협 점수 모듈 - 진입점
 */

export * from './types';
export * from './riskFactors';
export * from './threatScore';
