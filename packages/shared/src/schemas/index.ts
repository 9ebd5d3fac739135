export { searchBoundsSchema } from './cell-schema';
