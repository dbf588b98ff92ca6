import * as path from 'path'
import * as protobuf from 'protobufjs'
import { TableStateRecordSchema, type TableStateRecord } from './state'

export type TableStateCodecName = 'protobuf' | 'json'

/**
 * Converts between znode payloads and table state records.
 * `decode` throws on any payload that is not a valid record; callers
 * never pass an empty payload.
 */
export interface TableStateCodec {
    readonly name: TableStateCodecName
    decode(payload: Uint8Array): TableStateRecord
    encode(record: TableStateRecord): Uint8Array
}

const PROTO_FILE = path.join(__dirname, 'proto', 'ZooKeeper.proto')
const TABLE_MESSAGE_NAME = 'tablestate.Table'

/**
 * Wire format written by the coordinator: protobuf message `Table`
 * with a required `State state = 1` enum field.
 */
export class ProtobufTableStateCodec implements TableStateCodec {
    readonly name = 'protobuf'

    // Loaded on first use, shared by all instances
    private static tableType?: protobuf.Type

    private static getTableType(): protobuf.Type {
        if (!ProtobufTableStateCodec.tableType) {
            const root = protobuf.loadSync(PROTO_FILE)
            ProtobufTableStateCodec.tableType = root.lookupType(TABLE_MESSAGE_NAME)
        }
        return ProtobufTableStateCodec.tableType
    }

    decode(payload: Uint8Array): TableStateRecord {
        const tableType = ProtobufTableStateCodec.getTableType()
        const message = tableType.decode(payload)
        // Unknown enum numbers stay numeric here and are rejected by the schema
        const plain = tableType.toObject(message, { enums: String })
        return TableStateRecordSchema.parse(plain)
    }

    encode(record: TableStateRecord): Uint8Array {
        const tableType = ProtobufTableStateCodec.getTableType()
        const message = tableType.fromObject({ state: record.state })
        return tableType.encode(message).finish()
    }
}

/**
 * UTF-8 JSON records, e.g. `{"state":"DISABLED"}`
 */
export class JsonTableStateCodec implements TableStateCodec {
    readonly name = 'json'

    private readonly decoder = new TextDecoder('utf-8', { fatal: true })
    private readonly encoder = new TextEncoder()

    decode(payload: Uint8Array): TableStateRecord {
        const text = this.decoder.decode(payload)
        return TableStateRecordSchema.parse(JSON.parse(text))
    }

    encode(record: TableStateRecord): Uint8Array {
        return this.encoder.encode(JSON.stringify({ state: record.state }))
    }
}

export function createTableStateCodec(name: TableStateCodecName): TableStateCodec {
    switch (name) {
        case 'protobuf':
            return new ProtobufTableStateCodec()
        case 'json':
            return new JsonTableStateCodec()
    }
}
