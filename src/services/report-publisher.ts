import { connect, type Channel } from 'amqplib';
import logger from '../lib/logger';
import type { TestReport } from '../types/report';

export type ReportPublisherOptions = {
  url: string;
  exchange: string;
  routingKey: string;
};

export type ReportEnvelope = {
  ok: boolean;
  host: string;
  report: TestReport;
  publishedAt: string;
};

type BrokerConnection = Awaited<ReturnType<typeof connect>>;

const log = logger.child('publisher');

/**
 * Publishes the final report to a durable topic exchange. One connection per
 * publish: a run produces a single report.
 */
export class ReportPublisher {
  constructor(private readonly options: ReportPublisherOptions) {}

  async publish(envelope: ReportEnvelope): Promise<boolean> {
    let conn: BrokerConnection | undefined;
    let ch: Channel | undefined;
    try {
      conn = await connect(this.options.url);
      conn.on('error', (err) => {
        log.error('AMQP connection error', { err });
      });
      ch = await conn.createChannel();
      await ch.assertExchange(this.options.exchange, 'topic', { durable: true });
      const sent = ch.publish(
        this.options.exchange,
        this.options.routingKey,
        Buffer.from(JSON.stringify(envelope)),
        {
          contentType: 'application/json',
          deliveryMode: 2,
        }
      );
      log.info('report published', {
        exchange: this.options.exchange,
        routingKey: this.options.routingKey,
        ok: envelope.ok,
      });
      return sent;
    } catch (err) {
      log.error('failed to publish report', { exchange: this.options.exchange, err });
      return false;
    } finally {
      await this.closeQuietly(ch, conn);
    }
  }

  private async closeQuietly(ch?: Channel, conn?: BrokerConnection): Promise<void> {
    try {
      await ch?.close();
      await conn?.close();
    } catch (err) {
      log.warn('failed to close AMQP connection', { err });
    }
  }
}
