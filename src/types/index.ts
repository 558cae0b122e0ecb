export * from './Alert';
export * from './Crisis';
export * from './Emergency';
export * from './Integrations';
export * from './Message';
export * from './Session';
