import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import type { NotificationSeverity, Notifier } from '../../lib/reclamation/types.js';
import { classifyAwsError } from './errors.js';

// SNS rejects subjects longer than 100 characters
const MAX_SUBJECT_LENGTH = 100;

export class SnsNotifier implements Notifier {
  constructor(
    private readonly client: SNSClient,
    private readonly topicArn: string
  ) {}

  async send(severity: NotificationSeverity, subject: string, body: string): Promise<void> {
    const fullSubject = `[${severity}] ${subject}`;

    try {
      await this.client.send(
        new PublishCommand({
          TopicArn: this.topicArn,
          Subject: fullSubject.length > MAX_SUBJECT_LENGTH ? `${fullSubject.slice(0, MAX_SUBJECT_LENGTH - 3)}...` : fullSubject,
          Message: body,
          MessageAttributes: {
            severity: { DataType: 'String', StringValue: severity },
          },
        })
      );
    } catch (err: unknown) {
      throw classifyAwsError(err, 'Publish');
    }
  }
}
