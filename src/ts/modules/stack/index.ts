export { StackPanel } from './stackPanel';
