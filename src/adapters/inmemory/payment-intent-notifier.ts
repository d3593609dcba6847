import type {
  AuthorizationNotice,
  CaptureNotice,
  PaymentIntentNotifierPort,
} from "../../ports/payment-intent-notifier.js";

export class InMemoryPaymentIntentNotifier implements PaymentIntentNotifierPort {
  readonly authorizations: AuthorizationNotice[] = [];
  readonly captures: CaptureNotice[] = [];
  private failure: Error | null = null;

  /** Makes every later notification reject with `error`, or succeed again with `null`. */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  async recordAuthorization(notice: AuthorizationNotice): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.authorizations.push({ ...notice });
  }

  async recordCapture(notice: CaptureNotice): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.captures.push({ ...notice });
  }
}
