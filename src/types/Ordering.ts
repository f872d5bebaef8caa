export const enum Ordering {
    Less    = -1,
    Equal   =  0,
    Greater =  1
}
