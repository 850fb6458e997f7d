/**
 * Base Repository Interface
 *
 * The read/append operations every repository offers. Business logic works
 * against these domain-level contracts instead of Drizzle queries, so the
 * orchestrator can be tested with in-memory databases or fakes.
 *
 * Facts and interactions are never deleted, so unlike a full CRUD contract
 * there is no `update`/`delete` here; repositories add the mutations their
 * entity allows.
 *
 * @typeParam T - The domain model returned by the repository
 * @typeParam CreateInput - The input accepted when creating an entity
 */
export interface Repository<T, CreateInput> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Retrieves every entity of this type.
   */
  findAll(): Promise<T[]>;

  /**
   * Persists a new entity.
   *
   * @returns The stored domain model with generated id and timestamps
   */
  create(input: CreateInput): Promise<T>;
}
