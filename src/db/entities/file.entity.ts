import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn } from "typeorm";

/**
 * File Entity
 *
 * Metadata for uploaded resumes. The content lives on disk under the
 * storage directory; storage_uri points at it.
 */
@Entity({ name: "files" })
export class File {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 20,
        default: "resume"
    })
    type!: string;

    @Column({
        type: "varchar",
        length: 500
    })
    storage_uri!: string;

    @Column({
        type: "varchar",
        length: 255
    })
    original_name!: string;

    @Column({
        type: "varchar",
        length: 100
    })
    mime_type!: string;

    @Column({
        type: "varchar",
        length: 64
    })
    checksum!: string; // SHA-256 of the file content

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
