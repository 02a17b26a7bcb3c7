/**
 * Area Data Module
 */

export * from './area-data.types.js';
export * from './area-data.service.js';
export * from './category.mapper.js';
export * from './clustering/venue.kmeans.js';
export * from './clustering/venue.scoring.js';
export * from './providers/geocode.provider.js';
export * from './providers/places.provider.js';
export * from './providers/area-features.provider.js';
