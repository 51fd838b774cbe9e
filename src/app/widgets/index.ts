export * from './Widget';
export * from './Button';
export * from './Card';
export * from './Checkbox';
export * from './Container';
export * from './Field';
export * from './Flexbox';
export * from './Input';
export * from './NotificationBox';
export * from './Select';
export * from './Text';
