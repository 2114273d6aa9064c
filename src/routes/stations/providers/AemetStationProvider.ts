import { RawPayload } from "../../../types";
import { InventoryStation, InventoryStationProvider, isRecord, numberField, textField } from "../StationProvider";

/**
 * AEMET stations from the OpenData inventory (`{ estaciones: [ { idema, nombre, lat, lon, alt } ] }`), with
 * coordinates already converted to decimal degrees.
 */
export class AemetStationProvider extends InventoryStationProvider {
	public readonly providerId = "AEMET";
	public readonly providerName = "AEMET";
	protected readonly inventoryFile = "aemet.json";

	protected extractEntries( data: unknown ): unknown[] | undefined {
		if ( isRecord( data ) && Array.isArray( data.estaciones ) ) {
			return data.estaciones;
		}
		return super.extractEntries( data );
	}

	protected toStation( entry: RawPayload ): InventoryStation {
		return {
			stationId: textField( entry, "idema" ),
			name: textField( entry, "nombre" ),
			lat: numberField( entry, "lat" ),
			lon: numberField( entry, "lon" ),
			elevation: numberField( entry, "alt" )
		};
	}
}
