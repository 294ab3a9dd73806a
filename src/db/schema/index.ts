export { users } from './users';
export { accounts } from './accounts';
export { jobs } from './jobs';
export { escrows } from './escrows';
export { applications } from './applications';
