export enum AssetKind {
    STYLESHEET = 'css',
    SCRIPT = 'js',
}
