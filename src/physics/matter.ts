import Matter from 'matter-js';

export const { Vector } = Matter;
