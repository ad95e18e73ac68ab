import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import type { NewEvent } from '../events/event.definition';
import { EventsService } from '../events/events.service';

/**
 * Best-effort event writer. Callers never wait on it and never see its
 * failures; those are logged and dropped.
 */
@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);
  private readonly enabled: boolean;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly events: EventsService,
    @Inject(appConfig.KEY) cfg: ConfigType<typeof appConfig>,
  ) {
    this.enabled = cfg.auditEnabled;
  }

  record(event: NewEvent): void {
    if (!this.enabled) return;
    const write = this.events.create(event).then(
      () => undefined,
      (err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`audit event dropped (${event.message}): ${reason}`);
      },
    );
    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }

  /** Resolves once every write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
