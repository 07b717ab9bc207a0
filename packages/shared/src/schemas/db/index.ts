// Barrel export for Drizzle DB schemas
export {
  providers,
  patients,
  orders,
  generatedDocuments,
} from './order.schema.js';
export type {
  InsertProvider,
  SelectProvider,
  InsertPatient,
  SelectPatient,
  InsertOrder,
  SelectOrder,
  InsertGeneratedDocument,
  SelectGeneratedDocument,
} from './order.schema.js';

export { generationQueue, generationDeadLetters } from './queue.schema.js';
