/**
 * Service lifecycle and registry.
 *
 * Provides:
 *  - BaseService interface with initialize/shutdown lifecycle
 *  - ServiceRegistry for registering and resolving long-lived services
 *    (database, job runner) built once per process and passed by reference
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for long-lived services.
 */
export interface BaseService {
  /**
   * Open connections and run migrations.
   * Called after all services are constructed, in registration order.
   */
  initialize(): Promise<void>

  /**
   * Tear down the service gracefully.
   * Called in reverse registration order.
   */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named service registry with ordered lifecycle management.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * registry.register('jobRunner', jobRunner)
 *
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * Register a named service. Registration order is preserved for lifecycle calls.
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * Retrieve a registered service by name.
   * @throws {Error} if no service with the given name is registered.
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize all registered services in registration order.
   * Fails fast: later services may depend on earlier ones.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut down all registered services in reverse registration order.
   * Errors are collected and re-thrown as an AggregateError once every
   * service has had a chance to shut down.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    const reversed = [...this._order].reverse()

    for (const name of reversed) {
      const service = this._services.get(name)
      if (service !== undefined) {
        try {
          await service.shutdown()
        } catch (err) {
          errors.push(err instanceof Error ? err : new Error(String(err)))
        }
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
