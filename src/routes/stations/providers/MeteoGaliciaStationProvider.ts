import { RawPayload } from "../../../types";
import { InventoryStation, InventoryStationProvider, isRecord, numberField, textField } from "../StationProvider";

/**
 * MeteoGalicia stations, either the raw `listaEstacionsMeteo` response or a bare list of its entries.
 */
export class MeteoGaliciaStationProvider extends InventoryStationProvider {
	public readonly providerId = "METEOGALICIA";
	public readonly providerName = "MeteoGalicia";
	protected readonly inventoryFile = "meteogalicia.json";

	protected extractEntries( data: unknown ): unknown[] | undefined {
		if ( isRecord( data ) ) {
			return Array.isArray( data.listaEstacionsMeteo ) ? data.listaEstacionsMeteo : [];
		}
		return super.extractEntries( data );
	}

	protected toStation( entry: RawPayload ): InventoryStation {
		const stationId = textField( entry, "idEstacion" );
		return {
			stationId,
			name: textField( entry, "estacion" ) || stationId,
			lat: numberField( entry, "lat" ),
			lon: numberField( entry, "lon" ),
			elevation: numberField( entry, "altitude" )
		};
	}
}
