export const PLATFORM_GATEWAY_REGISTRY_TOKEN = 'PLATFORM_GATEWAY_REGISTRY';
export const REMEDIATION_ACTION_TOKEN = 'REMEDIATION_ACTION';
export const TRIAGE_SESSION_REPOSITORY_TOKEN = 'TRIAGE_SESSION_REPOSITORY';
