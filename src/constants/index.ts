export * from './insulation';
export * from './scope';
