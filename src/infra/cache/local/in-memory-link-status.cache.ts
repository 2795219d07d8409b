import { Injectable } from '@nestjs/common';
import type {
  ILinkStatusCache,
  LinkStatus,
} from '../../../domain/one-link/ports/link-status-cache.port';

interface CacheEntry {
  used: boolean;
  expiresAt: number;
}

/**
 * 인메모리 링크 상태 캐시
 *
 * 단일 프로세스/테스트용. 만료된 항목은 조회 시점에 제거한다.
 */
@Injectable()
export class InMemoryLinkStatusCache implements ILinkStatusCache {
  private readonly store = new Map<string, CacheEntry>();

  async get(token: string): Promise<LinkStatus | null> {
    const entry = this.store.get(token);
    if (!entry) return null;

    if (Date.now() >= entry.expiresAt) {
      this.store.delete(token);
      return null;
    }

    return { used: entry.used };
  }

  async set(token: string, used: boolean, ttlSeconds: number): Promise<void> {
    this.store.set(token, { used, expiresAt: Date.now() + ttlSeconds * 1000 });
  }
}
