export { healthService, HealthService } from './health.service';
export { userService } from './user.service';
export * from './user.service';
export { debtorService } from './debtor.service';
export * from './debtor.service';
export { ledgerService } from './ledger.service';
export * from './ledger.service';
export { deadlineService } from './deadline.service';
export * from './deadline.service';
export { recordingService } from './recording.service';
export * from './recording.service';
export { dashboardService } from './dashboard.service';
export * from './dashboard.service';
export { notificationService } from './notification.service';
export * from './notification.service';
