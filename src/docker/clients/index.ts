export { Docker } from './docker';
export { Container, Containers } from './containers';
export { Image, Images } from './images';
export { Network, Networks } from './networks';
export { Service, Services } from './services';
export { Volume, Volumes } from './volumes';
