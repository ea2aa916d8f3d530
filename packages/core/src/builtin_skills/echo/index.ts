export { echoSkill } from './echo_skill';
