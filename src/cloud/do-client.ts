/** DO API response types (only what we need) */
export interface DOVolume {
  id: string;
  name: string;
  description: string;
  size_gigabytes: number;
  region: { slug: string; name: string };
  droplet_ids: number[];
  created_at: string;
}

export interface DOSnapshot {
  id: string;
  name: string;
  created_at: string;
  regions: string[];
  resource_id: string;
  resource_type: "droplet" | "volume";
  min_disk_size: number;
  size_gigabytes: number;
  tags: string[];
}

interface DOPage {
  links?: { pages?: { next?: string } };
}

const PER_PAGE = 200;

export class DOApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly doMessage: string,
  ) {
    super(`DO API error ${statusCode}: ${doMessage}`);
    this.name = "DOApiError";
  }
}

export class DOClient {
  private readonly baseUrl = "https://api.digitalocean.com/v2";
  private readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  /** List every block storage volume in the account */
  async listVolumes(): Promise<DOVolume[]> {
    return this.getAll<{ volumes: DOVolume[] } & DOPage, DOVolume>("/volumes", (p) => p.volumes);
  }

  /** List every volume snapshot in the account */
  async listVolumeSnapshots(): Promise<DOSnapshot[]> {
    return this.getAll<{ snapshots: DOSnapshot[] } & DOPage, DOSnapshot>("/snapshots?resource_type=volume", (p) => p.snapshots);
  }

  /** Snapshot a volume. DO returns the snapshot record once it exists. */
  async createVolumeSnapshot(volumeId: string, name: string, tags: string[] = []): Promise<DOSnapshot> {
    return this.post<{ snapshot: DOSnapshot }>(`/volumes/${encodeURIComponent(volumeId)}/snapshots`, {
      name,
      tags,
    }).then((r) => r.snapshot);
  }

  /** Delete a snapshot by ID */
  async deleteSnapshot(snapshotId: string): Promise<void> {
    await this.del(`/snapshots/${encodeURIComponent(snapshotId)}`);
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
  }

  /** Follow `links.pages.next` until the last page. */
  private async getAll<P extends DOPage, T>(path: string, pick: (page: P) => T[]): Promise<T[]> {
    const sep = path.includes("?") ? "&" : "?";
    let url: string | undefined = `${this.baseUrl}${path}${sep}per_page=${PER_PAGE}`;
    const items: T[] = [];
    while (url) {
      const page: P = await this.request<P>(url, { method: "GET" });
      items.push(...pick(page));
      url = page.links?.pages?.next;
    }
    return items;
  }

  private async post<T>(path: string, body: unknown): Promise<T> {
    return this.request<T>(`${this.baseUrl}${path}`, { method: "POST", body: JSON.stringify(body) });
  }

  private async del(path: string): Promise<void> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "DELETE",
      headers: this.headers(),
    });
    if (!res.ok && res.status !== 204) {
      throw await toApiError(res);
    }
  }

  private async request<T>(url: string, init: { method: "GET" | "POST"; body?: string }): Promise<T> {
    const res = await fetch(url, { ...init, headers: this.headers() });
    if (!res.ok) {
      throw await toApiError(res);
    }
    return res.json() as Promise<T>;
  }
}

async function toApiError(res: Response): Promise<DOApiError> {
  const body = await res.json().catch(() => ({ message: res.statusText }));
  return new DOApiError(res.status, (body as { message?: string }).message ?? res.statusText);
}
