/**
 * Event socket client for telephony control servers.
 * @module fs-event-socket
 */
export * from './protocols';
