export { accessPolicyProviders } from './access-policy.providers';
export { ServiceRoleAuthority } from './service-role.authority';
