/**
 * ServiceLocator — typed lookup over the services object assembled at
 * startup. Handler factories receive it instead of reaching for globals.
 */
export class ServiceLocator<S extends object> {
  constructor(private readonly services: S) {}

  get<K extends keyof S>(key: K): S[K] {
    return this.services[key];
  }
}
