export const serviceName = 'status-relay';
export const serviceVersion = '0.1.0';
