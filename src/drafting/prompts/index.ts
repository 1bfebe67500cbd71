export * from './style-guide';
export * from './clarification';
export * from './review';
export * from './editing';
export * from './role-classification';
