import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

@Entity('wbs_elements')
export class CatalogEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  // 코드 비교는 대소문자 구분
  @Index({ unique: true })
  @Column({ length: 255, collation: 'utf8mb4_bin' })
  wbs_element!: string;

  @Column({ length: 255 })
  name!: string;

  @CreateDateColumn()
  created_at!: Date;
}
