export {Pipe} from './pipe';
export {RelaySender} from './relay-sender';
