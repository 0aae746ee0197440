export enum InterpolationMethod {
    EVERY_POINT = 'every_point',   // VOC 2010+ continuous AP
    ELEVEN_POINT = 'eleven_point', // VOC 2007
}
