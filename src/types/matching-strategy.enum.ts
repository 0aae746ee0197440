export enum MatchingStrategy {
    /** Best IoU among the still unmatched ground truth. */
    GREEDY = 'greedy',
    /** Best IoU among all ground truth; a claimed best box makes the detection a false positive. */
    PASCAL_VOC = 'pascal_voc',
}
