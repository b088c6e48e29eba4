import type { BlobStore } from '../types/collaboratorTypes.ts'

export class FakeBlobStore implements BlobStore {
  private readonly containers = new Map<string, Map<string, Uint8Array>>()

  constructor(containers: string[] = []) {
    for (const container of containers) {
      this.containers.set(container, new Map())
    }
  }

  put(container: string, key: string, payload: Uint8Array): Promise<void> {
    const objects = this.containers.get(container) ?? new Map<string, Uint8Array>()
    objects.set(key, Uint8Array.from(payload))
    this.containers.set(container, objects)
    return Promise.resolve()
  }

  get(container: string, key: string): Promise<Uint8Array | null> {
    const payload = this.containers.get(container)?.get(key)
    return Promise.resolve(payload ? Uint8Array.from(payload) : null)
  }

  delete(container: string, key: string): Promise<void> {
    this.containers.get(container)?.delete(key)
    return Promise.resolve()
  }

  exists(container: string, key?: string): Promise<boolean> {
    const objects = this.containers.get(container)
    if (!objects) {
      return Promise.resolve(false)
    }
    return Promise.resolve(key === undefined ? true : objects.has(key))
  }

  listKeys(container: string): string[] {
    return [...(this.containers.get(container)?.keys() ?? [])]
  }
}
