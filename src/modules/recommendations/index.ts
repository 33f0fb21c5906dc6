export { RecommendationController } from './controller/RecommendationController';
export { RecommendationService } from './service/RecommendationService';
export { ConstraintFilter } from './service/ConstraintFilter';
export { ScoringEngine } from './service/ScoringEngine';
export { DEFAULT_WEIGHTS, RECOMMENDATIONS_CONFIG } from './config';
export * from './dto/recommendation.dto';
