import { Entity, Column, PrimaryColumn, CreateDateColumn, Index } from 'typeorm';
import { AssetFailure } from '../interfaces/page.interface';

@Entity('pages')
export class PageEntity {
    // Allocated by PageStoreService.allocateId; archived asset file names embed it
    @PrimaryColumn('uuid')
    id!: string;

    @Index('UQ_pages_source_url', { unique: true })
    @Column({ type: 'text' })
    sourceUrl!: string;

    @Column({ type: 'text' })
    html!: string;

    @Column({ type: 'text', array: true, default: () => "'{}'" })
    cssPaths!: string[];

    @Column({ type: 'text', array: true, default: () => "'{}'" })
    jsPaths!: string[];

    @Column({ type: 'jsonb', default: () => "'[]'" })
    assetFailures!: AssetFailure[];

    @CreateDateColumn()
    createdAt!: Date;
}
