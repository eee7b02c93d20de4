import { Transporter } from 'nodemailer';
import { getEmailTransporter } from '../config/email';
import logger from '../config/logger';
import { PlacementRepository } from '../repositories/placement.repository';
import { Application, Company, EmailOptions, Student, User } from '../types';
import { EMAIL_VERIFICATION_EXPIRY_MINUTES, NOTIFICATION_STATUS } from '../utils/constants';
import { formatTimestamp } from '../utils/helpers';

const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export class EmailService {
  constructor(
    private readonly repository: PlacementRepository,
    private readonly getTransporter: () => Transporter | null = getEmailTransporter
  ) {}

  private buildTemplate(title: string, paragraphs: string[]): string {
    const body = paragraphs.map((p) => `<p>${escapeHtml(p)}</p>`).join('');
    return `
      <div style="font-family: Arial, sans-serif; background: #f5f7fb; padding: 24px;">
        <div style="max-width: 520px; margin: 0 auto; background: #ffffff; border-radius: 8px; padding: 24px; border: 1px solid #e5e7eb;">
          <h2 style="color: #111827; margin-top: 0;">${escapeHtml(title)}</h2>
          <div style="color: #4b5563; line-height: 1.6;">${body}</div>
        </div>
      </div>
    `;
  }

  /**
   * Sends one email and records the attempt. Resolves to whether the
   * message was handed to the mail server.
   */
  async sendEmail(options: EmailOptions, userId?: string): Promise<boolean> {
    const log = await this.repository.createNotificationLog({
      ...(userId && { userId }),
      email: options.to,
      subject: options.subject,
      body: options.text,
      status: NOTIFICATION_STATUS.PENDING,
    });

    const transporter = this.getTransporter();
    if (!transporter) {
      logger.warn(`Email transporter not configured. "${options.subject}" to ${options.to} not sent.`);
      await this.repository.updateNotificationLog(log.id, NOTIFICATION_STATUS.NOT_CONFIGURED);
      return false;
    }

    try {
      const info = await transporter.sendMail({
        from: process.env.EMAIL_FROM || 'Placement Cell <no-reply@placement-portal.local>',
        to: options.to,
        subject: options.subject,
        text: options.text,
        ...(options.html && { html: options.html }),
      });
      logger.info(`Email sent to ${options.to}: ${options.subject} (messageId=${info.messageId})`);
      await this.repository.updateNotificationLog(log.id, NOTIFICATION_STATUS.SENT);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to send email to ${options.to}: ${message}`);
      await this.repository.updateNotificationLog(log.id, NOTIFICATION_STATUS.FAILED, message);
      return false;
    }
  }

  async sendVerificationEmail(user: User, code: string): Promise<boolean> {
    const paragraphs = [
      'Welcome to the Placement Portal.',
      `Your verification code is ${code}. It expires in ${EMAIL_VERIFICATION_EXPIRY_MINUTES} minutes.`,
      'If you did not create this account, ignore this email.',
    ];

    return this.sendEmail(
      {
        to: user.email,
        subject: 'Verify your Placement Portal account',
        text: paragraphs.join('\n\n'),
        html: this.buildTemplate('Verify your email', paragraphs),
      },
      user.id
    );
  }

  async sendApplicationStatusEmail(
    user: User,
    student: Student,
    company: Company,
    application: Application
  ): Promise<boolean> {
    const paragraphs = [
      `Hello ${student.name},`,
      `Your application status for ${company.name} is now: ${application.status}.`,
      `Applied on: ${formatTimestamp(application.appliedAt)} UTC`,
      ...(application.closedReason ? [application.closedReason] : []),
      'Regards, Placement Cell',
    ];

    return this.sendEmail(
      {
        to: user.email,
        subject: `Application Status Updated - ${company.name}`,
        text: paragraphs.join('\n\n'),
        html: this.buildTemplate('Application Status Updated', paragraphs),
      },
      user.id
    );
  }
}
