/**
 * Result Table
 *
 * value size -> workload -> backend name -> throughput (kops/sec).
 * Built up across both backend passes and read once by the report.
 * Maps keep first-insertion order, which is the order the report prints.
 */

export interface ResultCell {
  workload: string
  throughput: Record<string, number>
}

export interface ResultSection {
  valueSize: number
  workloads: ResultCell[]
}

export class ResultTable {
  private readonly entries = new Map<number, Map<string, Map<string, number>>>()

  record(valueSize: number, workload: string, backend: string, kops: number): void {
    let byWorkload = this.entries.get(valueSize)
    if (!byWorkload) {
      byWorkload = new Map()
      this.entries.set(valueSize, byWorkload)
    }
    let byBackend = byWorkload.get(workload)
    if (!byBackend) {
      byBackend = new Map()
      byWorkload.set(workload, byBackend)
    }
    byBackend.set(backend, kops)
  }

  get(valueSize: number, workload: string, backend: string): number | undefined {
    return this.entries.get(valueSize)?.get(workload)?.get(backend)
  }

  valueSizes(): number[] {
    return [...this.entries.keys()]
  }

  workloads(valueSize: number): string[] {
    return [...(this.entries.get(valueSize)?.keys() ?? [])]
  }

  get size(): number {
    let count = 0
    for (const byWorkload of this.entries.values()) {
      for (const byBackend of byWorkload.values()) {
        count += byBackend.size
      }
    }
    return count
  }

  toJSON(): ResultSection[] {
    return [...this.entries].map(([valueSize, byWorkload]) => ({
      valueSize,
      workloads: [...byWorkload].map(([workload, byBackend]) => ({
        workload,
        throughput: Object.fromEntries(byBackend),
      })),
    }))
  }
}
